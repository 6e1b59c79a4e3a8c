/**
 * Section markers: hidden RTF groups naming the fragment each block came from.
 *
 *   {\v rtfmerge/from: 1.1.intro.tex}
 *   ...converted body...
 *   {\v rtfmerge/to: 1.1.intro.tex}
 *
 * `\v` is hidden text: word processors keep it through an edit-and-save but
 * don't print it. On re-save they usually add formatting control words
 * around it (`{\rtlch\fcs1 \af0 \ltrch\fcs0 \v\insrsid123 rtfmerge/from: ...}`),
 * so a marker is any group that opens with a run of control words including
 * `\v` (not `\v0`), `\comment` or `\*\comment`, followed by the marker text.
 * Names are written 7-bit clean (`\uN?`) and read back with `\'hh` decoded.
 */

import { decodeRtfText, encodeRtfText } from "../rtf/groups.js";
import type { MarkedSection } from "../shared/types.js";

export const DEFAULT_MARKER_TAG = "rtfmerge";

export function markerOpen(tag: string, name: string): string {
  return `{\\v ${tag}/from: ${encodeRtfText(name)}}`;
}

export function markerClose(tag: string, name: string): string {
  return `{\\v ${tag}/to: ${encodeRtfText(name)}}`;
}

export function wrapSection(rtf: string, name: string, tag: string = DEFAULT_MARKER_TAG): string {
  return `${markerOpen(tag, name)}\n${rtf}\n${markerClose(tag, name)}`;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const CONTROL_WORD = String.raw`(?:\\\*|\\[A-Za-z]+-?\d*)`;
const CONTROL_RUN = String.raw`(${CONTROL_WORD}(?:\s*${CONTROL_WORD})*)`;
const MARKER_NAME = String.raw`((?:\\.|[^}\\])*)`;

function markerPattern(tag: string): RegExp {
  return new RegExp(String.raw`\{${CONTROL_RUN}\s*${escapeRegExp(tag)}/(from|to):\s*${MARKER_NAME}\}`, "g");
}

/** True when the control words make the group hidden text or a comment. */
function isHiddenRun(controlWords: string): boolean {
  let hidden = false;
  for (const word of controlWords.matchAll(/\\([A-Za-z]+)(-?\d+)?/g)) {
    if (word[1] === "comment") return true;
    if (word[1] === "v") hidden = word[2] !== "0";
  }
  return hidden;
}

interface FoundMarker {
  kind: "from" | "to";
  name: string;
  start: number;
  end: number;
}

function scanMarkers(rtf: string, tag: string): FoundMarker[] {
  const found: FoundMarker[] = [];
  for (const match of rtf.matchAll(markerPattern(tag))) {
    if (!isHiddenRun(match[1])) continue;
    found.push({
      kind: match[2] === "from" ? "from" : "to",
      name: decodeRtfText(match[3].trim()),
      start: match.index ?? 0,
      end: (match.index ?? 0) + match[0].length,
    });
  }
  return found;
}

export interface MarkerScan {
  sections: MarkedSection[];
  /** Names of `from` markers with no matching `to` marker. */
  orphans: string[];
}

/**
 * Split a merged RTF document into marked sections, in document order.
 * A section runs from a `from` marker to the nearest following `to` marker
 * with the same name; sections do not nest.
 */
export function findMarkedSections(rtf: string, tag: string = DEFAULT_MARKER_TAG): MarkerScan {
  const markers = scanMarkers(rtf, tag);
  const sections: MarkedSection[] = [];
  const orphans: string[] = [];

  let i = 0;
  while (i < markers.length) {
    const open = markers[i];
    if (open.kind !== "from") {
      i++;
      continue;
    }

    const closeIndex = markers.findIndex((m, j) => j > i && m.kind === "to" && m.name === open.name);
    if (closeIndex === -1) {
      orphans.push(open.name);
      i++;
      continue;
    }

    sections.push({
      name: open.name,
      ordinal: sections.length,
      rtf: rtf.slice(open.end, markers[closeIndex].start).trim(),
    });
    i = closeIndex + 1;
  }

  return { sections, orphans };
}
