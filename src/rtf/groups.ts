/**
 * Brace-group helpers for raw RTF text.
 *
 * A brace preceded by an odd number of backslashes (`\{`, `\\\{`) is a
 * literal character, not a group delimiter.
 */

export function isEscaped(content: string, index: number): boolean {
  let backslashes = 0;
  for (let i = index - 1; i >= 0 && content[i] === "\\"; i--) {
    backslashes++;
  }
  return backslashes % 2 === 1;
}

/**
 * Index of the `{` opening the innermost group that contains `index`,
 * or -1 when `index` is at top level.
 */
export function findEnclosingGroupStart(content: string, index: number): number {
  let depth = 0;
  for (let i = index - 1; i >= 0; i--) {
    const ch = content[i];
    if (ch !== "{" && ch !== "}") continue;
    if (isEscaped(content, i)) continue;
    if (ch === "}") {
      depth++;
    } else if (depth === 0) {
      return i;
    } else {
      depth--;
    }
  }
  return -1;
}

/**
 * Index of the `}` closing the group opened at `openIndex`, or -1 if the
 * group is unbalanced.
 */
export function findGroupEnd(content: string, openIndex: number): number {
  let depth = 0;
  for (let i = openIndex; i < content.length; i++) {
    const ch = content[i];
    if (ch === "\\") {
      i++;
      continue;
    }
    if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

/** Escape text for use inside an RTF group. */
export function escapeRtfText(text: string): string {
  return text.replace(/[\\{}]/g, (ch) => `\\${ch}`);
}

/**
 * Escape text and encode everything outside 7-bit ASCII as `\uN?`
 * (N is the signed 16-bit UTF-16 code unit).
 */
export function encodeRtfText(text: string): string {
  const escaped = escapeRtfText(text);
  let out = "";
  for (let i = 0; i < escaped.length; i++) {
    const code = escaped.charCodeAt(i);
    out += code < 0x80 ? escaped[i] : `\\u${code > 0x7fff ? code - 0x10000 : code}?`;
  }
  return out;
}

const CP1252 = new TextDecoder("windows-1252");

// \uN with its fallback (`?` or one \'hh), runs of \'hh bytes, escaped \ { }
const ENCODED_TEXT_RE = /\\u(-?\d+) ?(?:\\'[0-9a-fA-F]{2}|\?)?|((?:\\'[0-9a-fA-F]{2})+)|\\([\\{}])/g;

/** Inverse of encodeRtfText; also reads `\'hh` bytes an editor wrote as cp1252. */
export function decodeRtfText(text: string): string {
  return text.replace(
    ENCODED_TEXT_RE,
    (match: string, unicode: string | undefined, hex: string | undefined, escaped: string | undefined) => {
      if (unicode !== undefined) {
        const n = Number(unicode);
        return String.fromCharCode(n < 0 ? n + 0x10000 : n);
      }
      if (hex !== undefined) {
        const bytes = Uint8Array.from(hex.slice(2).split("\\'"), (h) => parseInt(h, 16));
        return CP1252.decode(bytes);
      }
      return escaped ?? match;
    },
  );
}

export function looksLikeRtf(content: string): boolean {
  return content.replace(/^\uFEFF/, "").trimStart().startsWith("{\\rtf");
}

/** Give a bare RTF snippet a document header so readers accept it. */
export function wrapRtfDocument(snippet: string): string {
  return looksLikeRtf(snippet) ? snippet : `{\\rtf1\\ansi\\deff0\n${snippet}\n}`;
}
