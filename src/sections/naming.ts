/**
 * Output filenames for extracted sections.
 */

import path from "path";

const FORMAT_EXTENSIONS: Record<string, string> = {
  latex: ".tex",
  tex: ".tex",
  markdown: ".md",
  markdown_strict: ".md",
  markdown_phpextra: ".md",
  markdown_mmd: ".md",
  gfm: ".md",
  commonmark: ".md",
  commonmark_x: ".md",
  html: ".html",
  plain: ".txt",
  org: ".org",
  rst: ".rst",
};

/** "markdown+smart" → ".md"; unknown formats use their own name. */
export function extensionForFormat(format: string): string {
  const base = format.split(/[+-]/)[0].toLowerCase();
  return FORMAT_EXTENSIONS[base] ?? `.${base}`;
}

export const FALLBACK_DOCUMENT_BASENAME = "document";

function withSuffix(name: string, n: number): string {
  const ext = path.extname(name);
  const stem = ext ? name.slice(0, -ext.length) : name;
  return `${stem}.${n}${ext}`;
}

/**
 * Allocates one safe, unique filename per extracted section.
 * Marker names are reduced to their basename; duplicates get ".2", ".3", ...
 * before the extension.
 */
export class SectionNamer {
  private used = new Set<string>();

  constructor(private readonly extension: string) {}

  allocate(markerName: string, ordinal: number): string {
    let base = path.basename(markerName.replace(/\\/g, "/")).trim();
    if (!base || base === "." || base === "..") {
      base = `section-${String(ordinal + 1).padStart(2, "0")}${this.extension}`;
    }

    let candidate = base;
    for (let n = 2; this.used.has(candidate); n++) {
      candidate = withSuffix(base, n);
    }
    this.used.add(candidate);
    return candidate;
  }
}
