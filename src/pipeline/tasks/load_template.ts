/**
 * LOAD_TEMPLATE Task: Read the official template and locate the placeholder.
 */

import { loadOfficialTemplate } from "../../template/template_loader.js";
import { sha256Rtf } from "../../rtf/io.js";
import { taskSucceeded } from "./result.js";
import type { TaskHandler } from "../types.js";

export const handleLoadTemplate: TaskHandler = async (input, store, ctx) => {
  const t0 = new Date();
  const { config, logger } = ctx;

  const template = loadOfficialTemplate(config.officialTemplate, config.placeholder, {
    replaceEnclosingGroup: config.replaceEnclosingGroup,
    logger,
  });
  logger.info(
    "TEMPLATE",
    `${template.path} (placeholder at offset ${template.location.index}${template.location.groupReplaced ? ", replacing its group" : ""})`,
  );

  const ref = store.set("template", ctx.runId, template);

  ctx.trace.record({
    step: input.taskType,
    startedAt: t0,
    completedAt: new Date(),
    inputs: [{ path: template.path, sha256: sha256Rtf(template.content) }],
    details: {
      placeholderOffset: template.location.index,
      placeholderOccurrences: template.location.occurrences,
      groupReplaced: template.location.groupReplaced,
    },
  });

  return taskSucceeded(input, t0, [ref]);
};
