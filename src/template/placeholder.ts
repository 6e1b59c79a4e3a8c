/**
 * Placeholder splice: insert compiled content into the official template.
 */

import { findEnclosingGroupStart, findGroupEnd } from "../rtf/groups.js";

export interface PlaceholderLocation {
  /** Index of the first occurrence. */
  index: number;
  occurrences: number;
  /** Range replaced by the splice, end exclusive. */
  replaceStart: number;
  replaceEnd: number;
  /** True when the whole enclosing formatting group is replaced. */
  groupReplaced: boolean;
}

export interface SpliceOptions {
  replaceEnclosingGroup?: boolean;
}

export interface SpliceResult {
  document: string;
  location: PlaceholderLocation;
}

export function countOccurrences(haystack: string, needle: string): number {
  if (needle.length === 0) return 0;
  let count = 0;
  let from = 0;
  for (;;) {
    const idx = haystack.indexOf(needle, from);
    if (idx === -1) return count;
    count++;
    from = idx + needle.length;
  }
}

/**
 * Find the placeholder and the range a splice should replace.
 * Returns null if the placeholder is absent.
 *
 * With `replaceEnclosingGroup` (the default) the innermost group holding the
 * placeholder is replaced, unless that group is the document's root group.
 */
export function locatePlaceholder(
  template: string,
  placeholder: string,
  options: SpliceOptions = {},
): PlaceholderLocation | null {
  const index = placeholder.length > 0 ? template.indexOf(placeholder) : -1;
  if (index === -1) return null;

  const occurrences = countOccurrences(template, placeholder);
  const textEnd = index + placeholder.length;
  const textOnly: PlaceholderLocation = {
    index,
    occurrences,
    replaceStart: index,
    replaceEnd: textEnd,
    groupReplaced: false,
  };

  if (options.replaceEnclosingGroup === false) return textOnly;

  const groupStart = findEnclosingGroupStart(template, index);
  if (groupStart === -1) return textOnly;
  // never replace the root {\rtf1 ...} group
  if (findEnclosingGroupStart(template, groupStart) === -1) return textOnly;

  const groupEnd = findGroupEnd(template, groupStart);
  if (groupEnd === -1 || groupEnd < textEnd) return textOnly;

  return {
    index,
    occurrences,
    replaceStart: groupStart,
    replaceEnd: groupEnd + 1,
    groupReplaced: true,
  };
}

/** Replace a located placeholder range with content. */
export function applySplice(template: string, location: PlaceholderLocation, content: string): string {
  return template.slice(0, location.replaceStart) + content + template.slice(location.replaceEnd);
}

/**
 * Locate and replace in one step. Throws if the placeholder is missing;
 * callers that want a ConfigError should call locatePlaceholder first.
 */
export function spliceTemplate(
  template: string,
  placeholder: string,
  content: string,
  options: SpliceOptions = {},
): SpliceResult {
  const location = locatePlaceholder(template, placeholder, options);
  if (!location) {
    throw new Error(`Placeholder not found in template: "${placeholder}"`);
  }
  return { document: applySplice(template, location, content), location };
}
