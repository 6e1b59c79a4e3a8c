/**
 * PipelineRuntime: runs one pipeline's tasks in order.
 *
 * Creates a fresh InMemoryTaskStore per run, executes tasks in
 * topological order, collects results, and halts on the first failure.
 */

import { v4 as uuidv4 } from "uuid";
import { InMemoryTaskStore } from "./store.js";
import { getExecutionOrder, getTaskDefinition } from "./registry.js";
import type {
  PipelineKind,
  PipelineRunResult,
  TaskContext,
  TaskInputBundle,
  TaskResult,
  TaskType,
} from "./types.js";

export class PipelineRuntime {
  private kind: PipelineKind;
  private ctx: TaskContext;

  constructor(kind: PipelineKind, ctx: TaskContext) {
    this.kind = kind;
    this.ctx = ctx;
  }

  async execute(): Promise<PipelineRunResult> {
    const correlationId = uuidv4();
    const store = new InMemoryTaskStore();
    const taskResults = new Map<TaskType, TaskResult>();
    const t0 = Date.now();

    for (const taskType of getExecutionOrder(this.kind)) {
      const def = getTaskDefinition(this.kind, taskType);
      const input: TaskInputBundle = { taskType, taskId: uuidv4(), correlationId };

      const result = await this.runTask(input, () => def.handler(input, store, this.ctx));
      taskResults.set(taskType, result);

      if (result.status === "failed") {
        return {
          kind: this.kind,
          correlationId,
          taskResults,
          store,
          totalDurationMs: Date.now() - t0,
          failed: { taskType, error: result.error, cause: result.cause },
        };
      }
    }

    return {
      kind: this.kind,
      correlationId,
      taskResults,
      store,
      totalDurationMs: Date.now() - t0,
    };
  }

  /** A thrown handler error becomes a failed result. */
  private async runTask(input: TaskInputBundle, run: () => Promise<TaskResult>): Promise<TaskResult> {
    const startedAt = new Date();
    try {
      return await run();
    } catch (err) {
      const completedAt = new Date();
      const error = err instanceof Error ? err.message : String(err);
      return {
        status: "failed",
        error,
        cause: err,
        output: {
          ...input,
          producedRefs: [],
          timing: { startedAt, completedAt, durationMs: completedAt.getTime() - startedAt.getTime() },
          status: "failed",
          errors: [error],
        },
      };
    }
  }
}
