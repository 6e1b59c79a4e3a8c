/**
 * Subprocess runner shared by the converter and the PDF compiler.
 *
 * Runs without a shell; arguments are passed as-is. There is no timeout:
 * a hung tool hangs the run.
 */

import { spawn } from "child_process";

export interface CommandResult {
  /** null when the process could not be spawned. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Spawn error message (ENOENT and friends), if any. */
  spawnError?: string;
  /** Error writing stdin, e.g. EPIPE when the child exits without reading it. */
  stdinError?: string;
}

export interface CommandOptions {
  cwd?: string;
  /** Written to the child's stdin, which is then closed. */
  input?: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions,
) => Promise<CommandResult>;

export const runCommand: CommandRunner = (command, args, options = {}) => {
  return new Promise((resolve) => {
    const proc = spawn(command, args, {
      cwd: options.cwd,
      shell: false,
      stdio: ["pipe", "pipe", "pipe"],
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let settled = false;
    let stdinError: string | undefined;

    proc.stdout.on("data", (data: Buffer) => stdout.push(data));
    proc.stderr.on("data", (data: Buffer) => stderr.push(data));

    proc.on("error", (err: Error) => {
      if (settled) return;
      settled = true;
      resolve({
        exitCode: null,
        stdout: Buffer.concat(stdout).toString("utf-8"),
        stderr: Buffer.concat(stderr).toString("utf-8"),
        spawnError: err.message,
      });
    });

    proc.on("close", (code: number | null) => {
      if (settled) return;
      settled = true;
      resolve({
        exitCode: code ?? 1,
        stdout: Buffer.concat(stdout).toString("utf-8"),
        stderr: Buffer.concat(stderr).toString("utf-8"),
        stdinError,
      });
    });

    proc.stdin.on("error", (err: Error) => {
      stdinError = err.message;
    });
    proc.stdin.end(options.input ?? "");
  });
};

/** "pandoc --to=rtf a.tex", for log lines and error messages. */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args].map((part) => (/\s/.test(part) ? JSON.stringify(part) : part)).join(" ");
}
