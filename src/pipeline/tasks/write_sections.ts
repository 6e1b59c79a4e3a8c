/**
 * WRITE_SECTIONS Task: one markup file per extracted section.
 */

import { mkdirSync, writeFileSync } from "fs";
import { sha256String } from "../../shared/hash.js";
import { taskSucceeded } from "./result.js";
import type { WrittenFile } from "../../shared/types.js";
import type { TaskHandler } from "../types.js";

export const handleWriteSections: TaskHandler = async (input, store, ctx) => {
  const t0 = new Date();

  const extracted = store.get("extracted_sections", ctx.runId);
  mkdirSync(ctx.config.outputDir, { recursive: true });

  const written: WrittenFile[] = [];
  for (const section of extracted) {
    writeFileSync(section.outputPath, section.markup);
    written.push({ path: section.outputPath, sha256: sha256String(section.markup) });
    ctx.logger.info("OUTPUT", `Wrote ${section.outputPath}`);
  }

  const ref = store.set("section_files", ctx.runId, written);

  ctx.trace.record({
    step: input.taskType,
    startedAt: t0,
    completedAt: new Date(),
    outputs: written,
  });

  return taskSucceeded(input, t0, [ref]);
};
