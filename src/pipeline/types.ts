/**
 * Pipeline Types
 *
 * Each stage of a compile or extract run is a task that reads and writes
 * typed values through a per-run in-memory TaskStore.
 */

import type { RtfMergeConfig } from "../config/schema.js";
import type { DocumentConverter } from "../convert/converter.js";
import type { CommandRunner } from "../convert/process.js";
import type { PdfCompileOutcome } from "../compile/pdf.js";
import type { OfficialTemplate } from "../template/template_loader.js";
import type { StepLogger } from "../shared/logger.js";
import type { RunTrace } from "../trace/run_trace.js";
import type {
  ConvertedFragment,
  ExtractedSection,
  Fragment,
  MarkedSection,
  WrittenFile,
} from "../shared/types.js";

// ── Task Types ──────────────────────────────────────────────────────

export type PipelineKind = "compile" | "extract";

export type CompileTaskType =
  | "LOAD_TEMPLATE"
  | "COLLECT_FRAGMENTS"
  | "CONVERT_FRAGMENTS"
  | "MERGE_TEMPLATE"
  | "WRITE_OUTPUT"
  | "COMPILE_PDF";

export type ExtractTaskType =
  | "READ_MERGED"
  | "SPLIT_SECTIONS"
  | "CONVERT_SECTIONS"
  | "WRITE_SECTIONS";

export type TaskType = CompileTaskType | ExtractTaskType;

// ── Store Slots ─────────────────────────────────────────────────────

export interface MergedSource {
  path: string;
  content: string;
}

/** Value type held under each store kind. */
export interface StoreValues {
  template: OfficialTemplate;
  fragments: Fragment[];
  converted_fragments: ConvertedFragment[];
  merged_document: string;
  output_file: WrittenFile;
  pdf_outcome: PdfCompileOutcome;
  merged_source: MergedSource;
  sections: MarkedSection[];
  extracted_sections: ExtractedSection[];
  section_files: WrittenFile[];
}

export type StoreKind = keyof StoreValues;

export interface ProducedRef {
  kind: StoreKind;
  id: string;
  hash: string;
}

export interface TaskStore {
  set<K extends StoreKind>(kind: K, id: string, value: StoreValues[K]): ProducedRef;
  get<K extends StoreKind>(kind: K, id: string): StoreValues[K];
  has(kind: StoreKind, id: string): boolean;
  clear(): void;
  readonly size: number;
}

// ── Bundles & Results ───────────────────────────────────────────────

export interface TaskInputBundle {
  taskType: TaskType;
  taskId: string;
  correlationId: string;
}

export interface TaskOutputBundle {
  taskType: TaskType;
  taskId: string;
  correlationId: string;
  producedRefs: ProducedRef[];
  timing: {
    startedAt: Date;
    completedAt: Date;
    durationMs: number;
  };
  status: "success" | "failed";
  errors?: string[];
}

export type TaskResult =
  | { status: "success"; output: TaskOutputBundle }
  | { status: "failed"; output: TaskOutputBundle; error: string; cause: unknown };

// ── Handler & Context ───────────────────────────────────────────────

export interface TaskContext {
  config: RtfMergeConfig;
  /** Store id for this run's values. */
  runId: string;
  converter: DocumentConverter;
  runCommand: CommandRunner;
  logger: StepLogger;
  trace: RunTrace;
  /** RTF file to split; extract runs only. */
  extractSource?: string;
}

export type TaskHandler = (
  input: TaskInputBundle,
  store: TaskStore,
  ctx: TaskContext,
) => Promise<TaskResult>;

export interface TaskDefinition {
  taskType: TaskType;
  handler: TaskHandler;
  dependsOn: TaskType[];
}

// ── Runtime Result ──────────────────────────────────────────────────

export interface PipelineRunResult {
  kind: PipelineKind;
  correlationId: string;
  taskResults: Map<TaskType, TaskResult>;
  store: TaskStore;
  totalDurationMs: number;
  /** Set when a task failed; later tasks did not run. */
  failed?: { taskType: TaskType; error: string; cause: unknown };
}
