/**
 * Document converter: the external engine behind both pipeline directions.
 *
 * `DocumentConverter` is the seam tests replace; `PandocConverter` is the
 * real implementation and shells out once per call.
 */

import { buildForwardArgs, buildReverseArgs } from "./pandoc_args.js";
import type { ForwardOptions, ReverseOptions } from "./pandoc_args.js";
import { runCommand, formatCommand } from "./process.js";
import type { CommandRunner, CommandResult } from "./process.js";
import { resizeFootnotes, DEFAULT_FOOTNOTE_SIZE_PT } from "./footnotes.js";
import { wrapRtfDocument } from "../rtf/groups.js";
import { ConfigError, ConversionError } from "../shared/errors.js";
import type { StepLogger } from "../shared/logger.js";

export interface ToRtfOptions extends ForwardOptions {
  footnoteSize?: number;
}

export interface DocumentConverter {
  /** Convert a markup fragment on disk to an RTF body. */
  toRtf(fragmentPath: string, options: ToRtfOptions): Promise<string>;
  /** Convert an RTF snippet back to markup. */
  fromRtf(rtf: string, options: ReverseOptions): Promise<string>;
}

export interface PandocConverterOptions {
  pandocPath?: string;
  /** Working directory for pandoc; resource path "." resolves here. */
  cwd?: string;
  logger?: StepLogger;
  runner?: CommandRunner;
}

export class PandocConverter implements DocumentConverter {
  private readonly pandocPath: string;
  private readonly cwd?: string;
  private readonly logger?: StepLogger;
  private readonly run: CommandRunner;

  constructor(options: PandocConverterOptions = {}) {
    this.pandocPath = options.pandocPath ?? "pandoc";
    this.cwd = options.cwd;
    this.logger = options.logger;
    this.run = options.runner ?? runCommand;
  }

  async toRtf(fragmentPath: string, options: ToRtfOptions): Promise<string> {
    const args = buildForwardArgs(fragmentPath, options);
    const result = await this.exec(args);
    return resizeFootnotes(result.stdout, options.footnoteSize ?? DEFAULT_FOOTNOTE_SIZE_PT, this.logger);
  }

  async fromRtf(rtf: string, options: ReverseOptions): Promise<string> {
    const result = await this.exec(buildReverseArgs(options), wrapRtfDocument(rtf));
    return result.stdout;
  }

  /** Fails with ConfigError when pandoc cannot be started. Returns the version line. */
  async checkAvailable(): Promise<string> {
    const result = await this.run(this.pandocPath, ["--version"], { cwd: this.cwd });
    if (result.exitCode !== 0) {
      throw new ConfigError(
        `Pandoc is not installed or not runnable (${this.pandocPath}): ${result.spawnError ?? result.stderr.trim()}`,
      );
    }
    return result.stdout.split("\n")[0].trim();
  }

  private async exec(args: string[], input?: string): Promise<CommandResult> {
    this.logger?.info("PANDOC", formatCommand(this.pandocPath, args));
    const result = await this.run(this.pandocPath, args, { cwd: this.cwd, input });
    if (result.exitCode !== 0) {
      const reason =
        result.exitCode === null
          ? `could not be started: ${result.spawnError ?? "unknown error"}`
          : `exited with code ${result.exitCode}`;
      throw new ConversionError(`${formatCommand(this.pandocPath, args)} ${reason}`, {
        command: this.pandocPath,
        args,
        exitCode: result.exitCode,
        stderr: result.stderr,
      });
    }
    return result;
  }
}
