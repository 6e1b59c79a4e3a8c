/**
 * Error taxonomy for rtfmerge runs.
 *
 * ConfigError:      startup problems (config file, paths, template placeholder, missing pandoc).
 * ConversionError:  the document converter exited non-zero or could not be spawned.
 * PdfCompileError:  the optional PDF command failed after the RTF was written.
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export interface ProcessFailure {
  command: string;
  args: string[];
  /** null when the process could not be spawned at all. */
  exitCode: number | null;
  stderr: string;
}

export class ConversionError extends Error implements ProcessFailure {
  public readonly command: string;
  public readonly args: string[];
  public readonly exitCode: number | null;
  public readonly stderr: string;

  constructor(message: string, failure: ProcessFailure) {
    super(message);
    this.name = "ConversionError";
    this.command = failure.command;
    this.args = failure.args;
    this.exitCode = failure.exitCode;
    this.stderr = failure.stderr;
  }
}

export class PdfCompileError extends Error implements ProcessFailure {
  public readonly command: string;
  public readonly args: string[];
  public readonly exitCode: number | null;
  public readonly stderr: string;

  constructor(message: string, failure: ProcessFailure) {
    super(message);
    this.name = "PdfCompileError";
    this.command = failure.command;
    this.args = failure.args;
    this.exitCode = failure.exitCode;
    this.stderr = failure.stderr;
  }
}

export function isProcessFailure(err: unknown): err is ConversionError | PdfCompileError {
  return err instanceof ConversionError || err instanceof PdfCompileError;
}

/** Process exit code the CLI should use for a failed run. */
export function exitCodeFor(err: unknown): number {
  if (err instanceof ConversionError && err.exitCode !== null && err.exitCode !== 0) {
    return err.exitCode;
  }
  return 1;
}
