/**
 * COLLECT_FRAGMENTS Task: Enumerate input fragments in filename order.
 */

import { collectFragments } from "../../collect/collector.js";
import { sha256File } from "../../shared/hash.js";
import { taskSucceeded } from "./result.js";
import type { TaskHandler } from "../types.js";

export const handleCollectFragments: TaskHandler = async (input, store, ctx) => {
  const t0 = new Date();
  const { config, logger } = ctx;

  const fragments = collectFragments(config.inputDir, {
    extensions: config.extensions,
    logger,
  });
  logger.info("COLLECT", `${fragments.length} fragment(s) in ${config.inputDir}`);

  const ref = store.set("fragments", ctx.runId, fragments);

  ctx.trace.record({
    step: input.taskType,
    startedAt: t0,
    completedAt: new Date(),
    inputs: fragments.map((f) => ({ path: f.path, sha256: sha256File(f.path) })),
    details: { order: fragments.map((f) => f.name) },
  });

  return taskSucceeded(input, t0, [ref]);
};
