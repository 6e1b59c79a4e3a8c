/**
 * CONVERT_FRAGMENTS Task: markup → RTF for every fragment, in order.
 *
 * Sequential: each conversion finishes before the next starts. The first
 * failure aborts the run; nothing has been written at that point.
 */

import { wrapSection } from "../../sections/markers.js";
import { ConfigError } from "../../shared/errors.js";
import { taskSucceeded } from "./result.js";
import type { ConvertedFragment } from "../../shared/types.js";
import type { TaskHandler } from "../types.js";

export const handleConvertFragments: TaskHandler = async (input, store, ctx) => {
  const t0 = new Date();
  const { config, logger, converter } = ctx;

  const citationStyle = config.citationStyle;
  if (!citationStyle) {
    throw new ConfigError("citationStyle must be provided in the config");
  }

  const fragments = store.get("fragments", ctx.runId);
  const converted: ConvertedFragment[] = [];

  for (const fragment of fragments) {
    logger.info("CONVERT", `Converting ${fragment.name}`);
    const rtf = await converter.toRtf(fragment.path, {
      citationStyle,
      suppressBibliography: config.suppressBibliography,
      resourcePaths: config.resourcePaths,
      footnoteSize: config.footnoteSize,
    });
    converted.push({ ...fragment, rtf, wrapped: wrapSection(rtf, fragment.name, config.markerTag) });
  }

  const ref = store.set("converted_fragments", ctx.runId, converted);

  ctx.trace.record({
    step: input.taskType,
    startedAt: t0,
    completedAt: new Date(),
    details: {
      converted: converted.map((c) => ({ name: c.name, rtfLength: c.rtf.length })),
      citationStyle,
      footnoteSize: config.footnoteSize,
    },
  });

  return taskSucceeded(input, t0, [ref]);
};
