/**
 * WRITE_OUTPUT Task: write the merged RTF into the output directory.
 *
 * The file keeps the template's name: output/<template basename>.
 */

import { mkdirSync } from "fs";
import path from "path";
import { ConfigError } from "../../shared/errors.js";
import { sha256Rtf, writeRtfFile } from "../../rtf/io.js";
import { taskSucceeded } from "./result.js";
import type { TaskHandler } from "../types.js";

export function outputPathFor(outputDir: string, templatePath: string): string {
  return path.join(outputDir, path.basename(templatePath));
}

export const handleWriteOutput: TaskHandler = async (input, store, ctx) => {
  const t0 = new Date();
  const { config } = ctx;

  const merged = store.get("merged_document", ctx.runId);
  const outputPath = outputPathFor(config.outputDir, config.officialTemplate);

  if (path.resolve(outputPath) === path.resolve(config.officialTemplate)) {
    throw new ConfigError(
      `Output would overwrite the official template (${outputPath}); choose a different outputDir`,
    );
  }

  mkdirSync(config.outputDir, { recursive: true });
  writeRtfFile(outputPath, merged);
  ctx.logger.info("OUTPUT", `Wrote ${outputPath}`);

  const written = { path: outputPath, sha256: sha256Rtf(merged) };
  const ref = store.set("output_file", ctx.runId, written);

  ctx.trace.record({
    step: input.taskType,
    startedAt: t0,
    completedAt: new Date(),
    outputs: [written],
  });

  return taskSucceeded(input, t0, [ref]);
};
