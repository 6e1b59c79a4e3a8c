/**
 * Fragment Collector: enumerate input fragments in deterministic order.
 *
 * Order is plain lexicographic on the filename (code-unit comparison, not
 * locale collation), so "1.10.results.tex" sorts before "1.2.method.tex".
 */

import { existsSync, readdirSync, statSync } from "fs";
import path from "path";
import { ConfigError } from "../shared/errors.js";
import type { Fragment } from "../shared/types.js";
import type { StepLogger } from "../shared/logger.js";

export interface CollectOptions {
  /** Lowercase extensions with leading dot. */
  extensions: string[];
  logger?: StepLogger;
}

export function compareFilenames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function isEligibleFragment(name: string, extensions: string[]): boolean {
  if (name.startsWith(".")) return false;
  const ext = path.extname(name).toLowerCase();
  return ext.length > 0 && extensions.includes(ext);
}

/**
 * Names should start with a two-digit ordering prefix once dots are
 * removed ("1.1.intro.tex" → "11intro.tex"). Returns the names that don't.
 */
export function findUnorderedNames(names: string[]): string[] {
  return names.filter((name) => !/^\d{2}/.test(name.replace(/\./g, "")));
}

export function collectFragments(dir: string, options: CollectOptions): Fragment[] {
  const { logger } = options;

  if (!existsSync(dir)) {
    throw new ConfigError(`Input directory not found: ${dir}`);
  }
  if (!statSync(dir).isDirectory()) {
    throw new ConfigError(`Input path is not a directory: ${dir}`);
  }

  const names = readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && isEligibleFragment(entry.name, options.extensions))
    .map((entry) => entry.name)
    .sort(compareFilenames);

  if (names.length === 0) {
    logger?.warn("COLLECT", `No fragments (${options.extensions.join(", ")}) found in ${dir}`);
    return [];
  }

  for (const name of findUnorderedNames(names)) {
    logger?.warn("COLLECT", `${name} does not start with a two-digit number`);
  }

  return names.map((name, ordinal) => ({
    path: path.join(dir, name),
    name,
    ordinal,
  }));
}
