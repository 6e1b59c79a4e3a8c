/**
 * CONVERT_SECTIONS Task: RTF → markup for every detected section.
 *
 * Citations are not re-linked on the way back; they arrive as plain text.
 */

import path from "path";
import { extensionForFormat, SectionNamer } from "../../sections/naming.js";
import { taskSucceeded } from "./result.js";
import type { ExtractedSection } from "../../shared/types.js";
import type { TaskHandler } from "../types.js";

export const handleConvertSections: TaskHandler = async (input, store, ctx) => {
  const t0 = new Date();
  const { config, logger, converter } = ctx;

  const sections = store.get("sections", ctx.runId);
  const namer = new SectionNamer(extensionForFormat(config.extractFiletype));
  const extracted: ExtractedSection[] = [];

  for (const section of sections) {
    logger.info("CONVERT", `Extracting ${section.name} as ${config.extractFiletype}`);
    const markup = await converter.fromRtf(section.rtf, { to: config.extractFiletype });
    extracted.push({
      ...section,
      markup,
      outputPath: path.join(config.outputDir, namer.allocate(section.name, section.ordinal)),
    });
  }

  const ref = store.set("extracted_sections", ctx.runId, extracted);

  ctx.trace.record({
    step: input.taskType,
    startedAt: t0,
    completedAt: new Date(),
    details: { to: config.extractFiletype, files: extracted.map((e) => path.basename(e.outputPath)) },
  });

  return taskSucceeded(input, t0, [ref]);
};
