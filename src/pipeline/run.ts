/**
 * Compile and extract entry points.
 *
 * compile: LOAD_TEMPLATE → COLLECT_FRAGMENTS → CONVERT_FRAGMENTS →
 *          MERGE_TEMPLATE → WRITE_OUTPUT → COMPILE_PDF
 * extract: READ_MERGED → SPLIT_SECTIONS → CONVERT_SECTIONS → WRITE_SECTIONS
 *
 * A failed task stops the run and its error is rethrown to the caller.
 */

import { mkdirSync } from "fs";
import path from "path";
import { v4 as uuidv4 } from "uuid";
import { PipelineRuntime } from "./runtime.js";
import { PandocConverter } from "../convert/converter.js";
import { runCommand as spawnCommand } from "../convert/process.js";
import { createStepLogger } from "../shared/logger.js";
import { RunTrace, TRACE_FILENAME } from "../trace/run_trace.js";
import type { DocumentConverter } from "../convert/converter.js";
import type { CommandRunner } from "../convert/process.js";
import type { PdfCompileOutcome } from "../compile/pdf.js";
import type { RtfMergeConfig } from "../config/schema.js";
import type { StepLogger } from "../shared/logger.js";
import type { ExtractedSection, Fragment, WrittenFile } from "../shared/types.js";
import type { PipelineKind, PipelineRunResult, TaskContext } from "./types.js";

export interface RunInput {
  config: RtfMergeConfig;
  logger?: StepLogger;
  /** Replaces pandoc; when omitted a PandocConverter is created and checked. */
  converter?: DocumentConverter;
  /** Runs the PDF command (and pandoc, when no converter is given). */
  runCommand?: CommandRunner;
  runId?: string;
}

export interface ExtractInput extends RunInput {
  rtfPath: string;
}

interface RunSummary {
  run: PipelineRunResult;
  trace: RunTrace;
  tracePath: string | null;
  warnings: string[];
}

export interface CompileOutput extends RunSummary {
  outputPath: string;
  fragments: Fragment[];
  pdf: PdfCompileOutcome;
}

export interface ExtractOutput extends RunSummary {
  sections: ExtractedSection[];
  files: WrittenFile[];
}

async function buildContext(input: RunInput, extractSource?: string): Promise<TaskContext> {
  const { config } = input;
  const logger = input.logger ?? createStepLogger();
  const run = input.runCommand ?? spawnCommand;

  let converter = input.converter;
  if (!converter) {
    const pandoc = new PandocConverter({
      pandocPath: config.pandocPath,
      cwd: config.baseDir,
      logger,
      runner: run,
    });
    logger.info("PANDOC", await pandoc.checkAvailable());
    converter = pandoc;
  }

  const runId = input.runId ?? uuidv4();
  return {
    config,
    runId,
    converter,
    runCommand: run,
    logger,
    trace: new RunTrace(runId),
    extractSource,
  };
}

async function execute(kind: PipelineKind, ctx: TaskContext): Promise<RunSummary> {
  const run = await new PipelineRuntime(kind, ctx).execute();

  if (run.failed) {
    ctx.logger.error(run.failed.taskType, run.failed.error);
    if (run.failed.cause instanceof Error) throw run.failed.cause;
    throw new Error(run.failed.error);
  }

  let tracePath: string | null = null;
  if (ctx.config.writeTrace) {
    mkdirSync(ctx.config.outputDir, { recursive: true });
    tracePath = path.join(ctx.config.outputDir, TRACE_FILENAME);
    ctx.trace.writeTo(tracePath);
    ctx.logger.info("TRACE", `Wrote ${tracePath}`);
  }

  return { run, trace: ctx.trace, tracePath, warnings: [...ctx.logger.warnings] };
}

export async function runCompile(input: RunInput): Promise<CompileOutput> {
  const ctx = await buildContext(input);
  const summary = await execute("compile", ctx);
  const { store } = summary.run;

  return {
    ...summary,
    outputPath: store.get("output_file", ctx.runId).path,
    fragments: store.get("fragments", ctx.runId),
    pdf: store.get("pdf_outcome", ctx.runId),
  };
}

export async function runExtract(input: ExtractInput): Promise<ExtractOutput> {
  const ctx = await buildContext(input, path.resolve(input.rtfPath));
  const summary = await execute("extract", ctx);
  const { store } = summary.run;

  return {
    ...summary,
    sections: store.get("extracted_sections", ctx.runId),
    files: store.get("section_files", ctx.runId),
  };
}
