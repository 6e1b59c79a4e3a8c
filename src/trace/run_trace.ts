import { v4 as uuidv4 } from "uuid";
import { writeFileSync } from "fs";
import { contentHash } from "../shared/hash.js";
import type { WrittenFile } from "../shared/types.js";
import type { TaskType } from "../pipeline/types.js";

export interface TraceRecord {
  traceId: string;
  runId: string;
  step: TaskType;
  position: number;
  startedAt: string;
  completedAt: string;
  durationMs: number;
  inputs: WrittenFile[];
  outputs: WrittenFile[];
  details: Record<string, unknown>;
  hashChain: {
    contentHash: string;
    previousHash: string | null;
  };
}

export const TRACE_FILENAME = "rtfmerge.trace.json";

/**
 * Run trace: an ordered, hash-chained record of the steps of one run.
 */
export class RunTrace {
  private chain: TraceRecord[] = [];
  readonly runId: string;

  constructor(runId: string = uuidv4()) {
    this.runId = runId;
  }

  /**
   * Append a step record. Automatically chains hashes.
   */
  record(params: {
    step: TaskType;
    startedAt: Date;
    completedAt: Date;
    inputs?: WrittenFile[];
    outputs?: WrittenFile[];
    details?: Record<string, unknown>;
  }): TraceRecord {
    const position = this.chain.length;
    const previousHash = position > 0 ? this.chain[position - 1].hashChain.contentHash : null;

    const content = {
      traceId: uuidv4(),
      runId: this.runId,
      step: params.step,
      position,
      startedAt: params.startedAt.toISOString(),
      completedAt: params.completedAt.toISOString(),
      durationMs: params.completedAt.getTime() - params.startedAt.getTime(),
      inputs: params.inputs ?? [],
      outputs: params.outputs ?? [],
      details: params.details ?? {},
    };

    const record: TraceRecord = {
      ...content,
      hashChain: {
        contentHash: contentHash({ ...content, previousHash }),
        previousHash,
      },
    };

    this.chain.push(record);
    return record;
  }

  getChain(): TraceRecord[] {
    return [...this.chain];
  }

  /** Validate positions, linkage and content hashes. */
  validateChain(records: TraceRecord[] = this.chain): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    for (let i = 0; i < records.length; i++) {
      const record = records[i];

      if (record.position !== i) {
        errors.push(`Trace ${i}: position mismatch (expected ${i}, got ${record.position})`);
      }

      const expectedPrevious = i === 0 ? null : records[i - 1].hashChain.contentHash;
      if (record.hashChain.previousHash !== expectedPrevious) {
        errors.push(`Trace ${i}: previous hash does not match prior record`);
      }

      const { hashChain, ...content } = record;
      if (hashChain.contentHash !== contentHash({ ...content, previousHash: hashChain.previousHash })) {
        errors.push(`Trace ${i}: content hash mismatch`);
      }
    }

    return { valid: errors.length === 0, errors };
  }

  toJSON(): { runId: string; records: TraceRecord[] } {
    return { runId: this.runId, records: this.getChain() };
  }

  writeTo(filePath: string): void {
    writeFileSync(filePath, JSON.stringify(this.toJSON(), null, 2) + "\n");
  }
}
