/**
 * Footnote resizing for converter RTF output.
 *
 * pandoc writes a note as
 *   {\super\chftn}{\*\footnote\chftn\~\plain\pard {\pard \ql ... text\par}
 *   }
 * The note inherits the body font size and ends with an empty paragraph.
 * For every `\footnote` group this sets `\fsN` (half-points) before the note
 * mark and at the start of each paragraph, and drops the final `\par`.
 */

import { findEnclosingGroupStart, findGroupEnd } from "../rtf/groups.js";
import type { StepLogger } from "../shared/logger.js";

const FOOTNOTE_RE = /\\footnote(?![A-Za-z])/g;

export const DEFAULT_FOOTNOTE_SIZE_PT = 10;

export function fontSizeControl(sizePt: number): string {
  return `\\fs${Math.round(sizePt * 2)}`;
}

function resizeFootnoteGroup(group: string, fs: string, logger?: StepLogger): string {
  const mark = group.indexOf("\\chftn");
  if (mark === -1) {
    logger?.warn(
      "FOOTNOTE",
      "Could not find `\\chftn` after `\\footnote`; the footnote may be malformed and was left unchanged",
    );
    return group;
  }

  let out = group.slice(0, mark) + fs + group.slice(mark);
  out = out.replace(/\{\\pard(?![A-Za-z])/g, `{\\pard${fs}`);
  // last paragraph: "...\par}<ws>}" → "...}<ws>}"
  out = out.replace(/\\par(?![A-Za-z])(\s*\})(\s*)\}$/, "$1$2}");
  return out;
}

export function resizeFootnotes(
  rtf: string,
  sizePt: number = DEFAULT_FOOTNOTE_SIZE_PT,
  logger?: StepLogger,
): string {
  const fs = fontSizeControl(sizePt);
  let out = rtf;
  let searchFrom = 0;

  for (;;) {
    FOOTNOTE_RE.lastIndex = searchFrom;
    const match = FOOTNOTE_RE.exec(out);
    if (!match) break;

    const groupStart = findEnclosingGroupStart(out, match.index);
    const groupEnd = groupStart === -1 ? -1 : findGroupEnd(out, groupStart);
    if (groupEnd === -1) {
      logger?.warn("FOOTNOTE", `Unbalanced footnote group at offset ${match.index}; left unchanged`);
      searchFrom = match.index + match[0].length;
      continue;
    }

    const resized = resizeFootnoteGroup(out.slice(groupStart, groupEnd + 1), fs, logger);
    out = out.slice(0, groupStart) + resized + out.slice(groupEnd + 1);
    searchFrom = groupStart + resized.length;
  }

  return out;
}
