/**
 * COMPILE_PDF Task: optional PDF conversion of the written RTF.
 */

import { compilePdf } from "../../compile/pdf.js";
import { taskSucceeded } from "./result.js";
import type { TaskHandler } from "../types.js";

export function pdfPathFor(rtfPath: string): string {
  return rtfPath.replace(/\.[^./\\]*$/, "") + ".pdf";
}

export const handleCompilePdf: TaskHandler = async (input, store, ctx) => {
  const t0 = new Date();
  const { config } = ctx;

  const output = store.get("output_file", ctx.runId);
  const outcome = await compilePdf({
    pdfCompile: config.pdfCompile,
    rtfPath: output.path,
    pdfPath: pdfPathFor(output.path),
    outputDir: config.outputDir,
    cwd: config.baseDir,
    logger: ctx.logger,
    runner: ctx.runCommand,
  });
  if (outcome.status === "compiled") {
    ctx.logger.info("PDF", `Compiled ${outcome.pdfPath}`);
  }

  const ref = store.set("pdf_outcome", ctx.runId, outcome);

  ctx.trace.record({
    step: input.taskType,
    startedAt: t0,
    completedAt: new Date(),
    inputs: [output],
    details: { ...outcome },
  });

  return taskSucceeded(input, t0, [ref]);
};
