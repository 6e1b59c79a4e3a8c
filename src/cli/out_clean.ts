/**
 * Output Cleanup
 *
 * Empties the configured output directory before a run (`--clean`).
 * Uses Node.js fs APIs only.
 */

import { rmSync, mkdirSync, existsSync } from "fs";
import path from "path";

function isSameOrAncestor(candidate: string, target: string): boolean {
  const rel = path.relative(candidate, target);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

/**
 * Clean a target output directory: remove contents, recreate empty dir.
 * Safe: refuses the filesystem root, and any directory that is one of
 * `protectedPaths` or contains one of them.
 */
export function cleanOutputDir(outDir: string, protectedPaths: string[] = []): void {
  const resolved = path.resolve(outDir);

  if (path.parse(resolved).root === resolved) {
    throw new Error(`Safety: cleanOutputDir refuses to clean the filesystem root "${resolved}".`);
  }
  for (const p of protectedPaths) {
    const guarded = path.resolve(p);
    if (isSameOrAncestor(resolved, guarded)) {
      throw new Error(
        `Safety: cleanOutputDir refuses to clean "${resolved}" because it contains "${guarded}".`,
      );
    }
  }

  if (existsSync(resolved)) {
    rmSync(resolved, { recursive: true, force: true });
  }
  mkdirSync(resolved, { recursive: true });
}
