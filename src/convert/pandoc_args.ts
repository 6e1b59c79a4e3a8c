/**
 * pandoc argument builders for both directions.
 */

import path from "path";

export interface ForwardOptions {
  /** CSL style file; citeproc renders citations with it. */
  citationStyle: string;
  suppressBibliography: boolean;
  /** Extra resource directories; "." is always searched first. */
  resourcePaths?: string[];
  /** Target format, "rtf" unless testing something else. */
  to?: string;
}

export interface ReverseOptions {
  /** Target markup format, e.g. "latex" or "markdown". */
  to: string;
}

export function buildResourcePath(resourcePaths: string[] | undefined): string | null {
  if (!resourcePaths || resourcePaths.length === 0) return null;
  return [".", ...resourcePaths].join(path.delimiter);
}

/**
 * pandoc <fragment> --citeproc --csl=<style> --to=rtf
 *        --metadata=suppress-bibliography:<bool> [--resource-path=.:<dirs>]
 */
export function buildForwardArgs(fragmentPath: string, options: ForwardOptions): string[] {
  const args = [
    fragmentPath,
    "--citeproc",
    `--csl=${options.citationStyle}`,
    `--to=${options.to ?? "rtf"}`,
    `--metadata=suppress-bibliography:${options.suppressBibliography ? "true" : "false"}`,
  ];
  const resourcePath = buildResourcePath(options.resourcePaths);
  if (resourcePath !== null) {
    args.push(`--resource-path=${resourcePath}`);
  }
  return args;
}

/** RTF arrives on stdin; citations come back as plain text. */
export function buildReverseArgs(options: ReverseOptions): string[] {
  return ["--from=rtf", `--to=${options.to}`];
}
