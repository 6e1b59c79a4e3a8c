#!/usr/bin/env node
/**
 * CLI: rtfmerge
 *
 * Usage: npm run rtfmerge -- [--config <path>] [--clean] [--quiet]
 *        npm run rtfmerge -- --extract <file.rtf>
 *
 * Converts the fragments in inputDir to RTF, merges them into the official
 * template and writes outputDir/<template name>; with --extract, splits a
 * merged RTF back into one markup file per section.
 */

import "dotenv/config";
import { runCli } from "./run_cli.js";

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  },
);
