/**
 * Task Handler Barrel Export
 */

export { handleLoadTemplate } from "./load_template.js";
export { handleCollectFragments } from "./collect_fragments.js";
export { handleConvertFragments } from "./convert_fragments.js";
export { handleMergeTemplate } from "./merge_template.js";
export { handleWriteOutput } from "./write_output.js";
export { handleCompilePdf } from "./compile_pdf.js";
export { handleReadMerged } from "./read_merged.js";
export { handleSplitSections } from "./split_sections.js";
export { handleConvertSections } from "./convert_sections.js";
export { handleWriteSections } from "./write_sections.js";
