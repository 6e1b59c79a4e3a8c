/**
 * Shared domain types for the compile and extract pipelines.
 */

// ── Fragments ───────────────────────────────────────────────────────

export interface Fragment {
  /** Absolute path to the source file. */
  path: string;
  /** Filename including extension, e.g. "1.1.intro.tex". */
  name: string;
  /** 0-based position in lexicographic filename order. */
  ordinal: number;
}

export interface ConvertedFragment extends Fragment {
  /** RTF body produced by the converter, after footnote resizing. */
  rtf: string;
  /** Body wrapped in section markers, ready to splice. */
  wrapped: string;
}

// ── Sections (extraction) ───────────────────────────────────────────

export interface MarkedSection {
  /** Name recorded in the marker (the original fragment filename). */
  name: string;
  ordinal: number;
  /** RTF content between the markers, trimmed. */
  rtf: string;
}

export interface ExtractedSection extends MarkedSection {
  markup: string;
  outputPath: string;
}

// ── Files written by a run ──────────────────────────────────────────

export interface WrittenFile {
  path: string;
  sha256: string;
}
