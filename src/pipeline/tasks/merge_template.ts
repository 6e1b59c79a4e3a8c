/**
 * MERGE_TEMPLATE Task: splice the wrapped fragments into the template.
 */

import { applySplice } from "../../template/placeholder.js";
import { sha256Rtf } from "../../rtf/io.js";
import { taskSucceeded } from "./result.js";
import type { TaskHandler } from "../types.js";

export const handleMergeTemplate: TaskHandler = async (input, store, ctx) => {
  const t0 = new Date();

  const template = store.get("template", ctx.runId);
  const converted = store.get("converted_fragments", ctx.runId);

  const content = converted.map((c) => c.wrapped).join("\n");
  const merged = applySplice(template.content, template.location, content);
  ctx.logger.info("MERGE", `${converted.length} block(s) spliced into ${template.path}`);

  const ref = store.set("merged_document", ctx.runId, merged);

  ctx.trace.record({
    step: input.taskType,
    startedAt: t0,
    completedAt: new Date(),
    details: {
      blocks: converted.length,
      replacedRange: [template.location.replaceStart, template.location.replaceEnd],
      mergedSha256: sha256Rtf(merged),
    },
  });

  return taskSucceeded(input, t0, [ref]);
};
