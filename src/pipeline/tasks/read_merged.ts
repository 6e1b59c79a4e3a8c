/**
 * READ_MERGED Task: Load the RTF file to extract from.
 */

import { existsSync } from "fs";
import { ConfigError } from "../../shared/errors.js";
import { readRtfFile, sha256Rtf } from "../../rtf/io.js";
import { taskSucceeded } from "./result.js";
import type { TaskHandler } from "../types.js";

export const handleReadMerged: TaskHandler = async (input, store, ctx) => {
  const t0 = new Date();

  const sourcePath = ctx.extractSource;
  if (!sourcePath) {
    throw new ConfigError("No RTF file given to extract from");
  }
  if (!existsSync(sourcePath)) {
    throw new ConfigError(`RTF file not found: ${sourcePath}`);
  }

  const content = readRtfFile(sourcePath);
  ctx.logger.info("EXTRACT", `Reading ${sourcePath}`);

  const ref = store.set("merged_source", ctx.runId, { path: sourcePath, content });

  ctx.trace.record({
    step: input.taskType,
    startedAt: t0,
    completedAt: new Date(),
    inputs: [{ path: sourcePath, sha256: sha256Rtf(content) }],
  });

  return taskSucceeded(input, t0, [ref]);
};
