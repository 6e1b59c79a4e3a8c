/**
 * CLI driver: turns parsed arguments into a compile, extract or init run
 * and maps failures to an exit code.
 */

import path from "path";
import { loadConfig, resolveConfigPath, writeStarterConfig, CONFIG_ENV_VAR } from "../config/loader.js";
import { runCompile, runExtract } from "../pipeline/run.js";
import { cleanOutputDir } from "./out_clean.js";
import { parseCliArgs, UsageError, USAGE } from "./args.js";
import type { CliArgs } from "./args.js";
import { createStepLogger, consoleSink } from "../shared/logger.js";
import { exitCodeFor, isProcessFailure } from "../shared/errors.js";
import type { LogSink } from "../shared/logger.js";
import type { DocumentConverter } from "../convert/converter.js";
import type { CommandRunner } from "../convert/process.js";

export interface CliDeps {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  sink?: LogSink;
  converter?: DocumentConverter;
  runCommand?: CommandRunner;
}

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const cwd = deps.cwd ?? process.cwd();
  const env = deps.env ?? process.env;
  const sink = deps.sink ?? consoleSink;

  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (err) {
    if (err instanceof UsageError) {
      sink.error(`Error: ${err.message}`);
      sink.error(USAGE);
      return 2;
    }
    throw err;
  }

  if (args.mode === "help") {
    sink.info(USAGE);
    return 0;
  }

  const logger = createStepLogger({ quiet: args.quiet, sink });
  const configPath = resolveConfigPath(args.configPath, env[CONFIG_ENV_VAR], cwd);

  try {
    if (args.mode === "init") {
      writeStarterConfig(configPath);
      logger.info("INIT", `Wrote ${configPath}`);
      return 0;
    }

    const config = loadConfig(configPath, env);
    logger.info("CONFIG", configPath);

    if (args.mode === "extract" && args.extractPath) {
      const result = await runExtract({
        config,
        rtfPath: path.resolve(cwd, args.extractPath),
        logger,
        converter: deps.converter,
        runCommand: deps.runCommand,
      });
      logger.info("DONE", `${result.files.length} file(s) written to ${config.outputDir}`);
      return 0;
    }

    if (args.clean) {
      logger.info("CLEAN", `Cleaning output directory: ${config.outputDir}`);
      cleanOutputDir(config.outputDir, [config.inputDir, config.officialTemplate, config.baseDir, cwd]);
    }

    const result = await runCompile({
      config,
      logger,
      converter: deps.converter,
      runCommand: deps.runCommand,
    });
    logger.info("DONE", `${result.fragments.length} fragment(s) merged into ${result.outputPath}`);
    return 0;
  } catch (err) {
    sink.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    if (isProcessFailure(err) && err.stderr.trim()) {
      sink.error(err.stderr.trimEnd());
    }
    return exitCodeFor(err);
  }
}
