/**
 * SPLIT_SECTIONS Task: detect marked sections in the merged RTF.
 *
 * Boundary problems are warnings: an unclosed marker skips that section,
 * and a document with no markers is extracted whole as one section.
 */

import { findMarkedSections } from "../../sections/markers.js";
import { extensionForFormat, FALLBACK_DOCUMENT_BASENAME } from "../../sections/naming.js";
import { taskSucceeded } from "./result.js";
import type { MarkedSection } from "../../shared/types.js";
import type { TaskHandler } from "../types.js";

export const handleSplitSections: TaskHandler = async (input, store, ctx) => {
  const t0 = new Date();
  const { config, logger } = ctx;

  const source = store.get("merged_source", ctx.runId);
  const scan = findMarkedSections(source.content, config.markerTag);

  for (const name of scan.orphans) {
    logger.warn("SPLIT", `Section marker for ${name} has no closing marker; section skipped`);
  }

  let sections: MarkedSection[] = scan.sections;
  let fallback = false;
  if (sections.length === 0) {
    fallback = true;
    const name = `${FALLBACK_DOCUMENT_BASENAME}${extensionForFormat(config.extractFiletype)}`;
    logger.warn(
      "SPLIT",
      `No ${config.markerTag} section markers found in ${source.path}; extracting the whole document as ${name}`,
    );
    sections = [{ name, ordinal: 0, rtf: source.content }];
  } else {
    logger.info("SPLIT", `${sections.length} section(s): ${sections.map((s) => s.name).join(", ")}`);
  }

  const ref = store.set("sections", ctx.runId, sections);

  ctx.trace.record({
    step: input.taskType,
    startedAt: t0,
    completedAt: new Date(),
    details: {
      sections: sections.map((s) => s.name),
      orphans: scan.orphans,
      fallback,
    },
  });

  return taskSucceeded(input, t0, [ref]);
};
