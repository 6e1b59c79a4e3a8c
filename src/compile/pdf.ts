/**
 * PDF compilation: optional last step of the compile pipeline.
 *
 * `pdfCompile` is one of:
 *   ""      → off
 *   "auto"  → detect LibreOffice and convert headless
 *   any other string → a command template; %f is the RTF path, %o the PDF path
 */

import { existsSync } from "fs";
import { runCommand, formatCommand } from "../convert/process.js";
import type { CommandRunner } from "../convert/process.js";
import { ConfigError, PdfCompileError } from "../shared/errors.js";
import type { StepLogger } from "../shared/logger.js";

export const AUTO_PDF_COMPILE = "auto";
const FLATPAK_LIBREOFFICE = "org.libreoffice.LibreOffice";

export interface PlannedCommand {
  command: string;
  args: string[];
}

/**
 * Split a command template into arguments. Whitespace separates; single or
 * double quotes group; a backslash escapes the next character outside
 * single quotes.
 */
export function tokenizeCommand(template: string): string[] {
  const tokens: string[] = [];
  let current = "";
  let inToken = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < template.length; i++) {
    const ch = template[i];
    if (quote) {
      if (ch === quote) {
        quote = null;
      } else if (ch === "\\" && quote === '"' && i + 1 < template.length) {
        current += template[++i];
      } else {
        current += ch;
      }
      continue;
    }
    if (ch === '"' || ch === "'") {
      quote = ch;
      inToken = true;
    } else if (ch === "\\" && i + 1 < template.length) {
      current += template[++i];
      inToken = true;
    } else if (/\s/.test(ch)) {
      if (inToken) {
        tokens.push(current);
        current = "";
        inToken = false;
      }
    } else {
      current += ch;
      inToken = true;
    }
  }

  if (quote) {
    throw new ConfigError(`Unterminated ${quote} quote in pdfCompile command: ${template}`);
  }
  if (inToken) tokens.push(current);
  return tokens;
}

/** Tokenize, then substitute %f and %o inside every token. */
export function expandPdfCommand(template: string, rtfPath: string, pdfPath: string): PlannedCommand {
  const tokens = tokenizeCommand(template).map((token) =>
    token.replace(/%[fo]/g, (tok) => (tok === "%f" ? rtfPath : pdfPath)),
  );
  if (tokens.length === 0) {
    throw new ConfigError("pdfCompile command is empty");
  }
  return { command: tokens[0], args: tokens.slice(1) };
}

// ── LibreOffice detection ───────────────────────────────────────────

export interface DetectDeps {
  platform?: NodeJS.Platform;
  runner?: CommandRunner;
  exists?: (p: string) => boolean;
}

const WINDOWS_LIBREOFFICE = [
  "C:\\Program Files\\LibreOffice\\program\\soffice.exe",
  "C:\\Program Files (x86)\\LibreOffice\\program\\soffice.exe",
];

const MAC_LIBREOFFICE = "/Applications/LibreOffice.app/Contents/MacOS/soffice";

/**
 * Find a way to launch LibreOffice. Returns the command prefix
 * (e.g. ["soffice"] or ["flatpak", "run", "org.libreoffice.LibreOffice"]),
 * or null when none is installed.
 */
export async function detectLibreOffice(deps: DetectDeps = {}): Promise<string[] | null> {
  const platform = deps.platform ?? process.platform;
  const run = deps.runner ?? runCommand;
  const exists = deps.exists ?? existsSync;

  if (platform === "win32") {
    const found = WINDOWS_LIBREOFFICE.find((p) => exists(p));
    return found ? [found] : null;
  }

  for (const name of ["libreoffice", "soffice"]) {
    const which = await run("which", [name]);
    if (which.exitCode === 0 && which.stdout.trim()) return [name];
  }

  if (platform === "darwin" && exists(MAC_LIBREOFFICE)) {
    return [MAC_LIBREOFFICE];
  }

  const flatpak = await run("flatpak", ["list"]);
  if (flatpak.exitCode === 0 && flatpak.stdout.includes(FLATPAK_LIBREOFFICE)) {
    return ["flatpak", "run", FLATPAK_LIBREOFFICE];
  }

  return null;
}

export function libreOfficeCommand(prefix: string[], outputDir: string, rtfPath: string): PlannedCommand {
  return {
    command: prefix[0],
    args: [...prefix.slice(1), "--headless", "--convert-to", "pdf", "--outdir", outputDir, rtfPath],
  };
}

// ── Compile ─────────────────────────────────────────────────────────

export interface PdfCompileInput {
  pdfCompile: string;
  rtfPath: string;
  pdfPath: string;
  outputDir: string;
  cwd?: string;
  logger?: StepLogger;
  runner?: CommandRunner;
  detect?: DetectDeps;
}

export type PdfCompileOutcome =
  | { status: "disabled" }
  | { status: "unavailable" }
  | { status: "compiled"; command: string; args: string[]; pdfPath: string };

export async function compilePdf(input: PdfCompileInput): Promise<PdfCompileOutcome> {
  const setting = input.pdfCompile.trim();
  if (!setting) return { status: "disabled" };

  const run = input.runner ?? runCommand;
  let planned: PlannedCommand;

  if (setting.toLowerCase() === AUTO_PDF_COMPILE) {
    const prefix = await detectLibreOffice({ runner: run, ...input.detect });
    if (!prefix) {
      input.logger?.warn("PDF", "pdfCompile is \"auto\" but LibreOffice was not found; skipping PDF");
      return { status: "unavailable" };
    }
    planned = libreOfficeCommand(prefix, input.outputDir, input.rtfPath);
  } else {
    planned = expandPdfCommand(setting, input.rtfPath, input.pdfPath);
  }

  input.logger?.info("PDF", formatCommand(planned.command, planned.args));
  const result = await run(planned.command, planned.args, { cwd: input.cwd });
  if (result.exitCode !== 0) {
    const reason =
      result.exitCode === null
        ? `could not be started: ${result.spawnError ?? "unknown error"}`
        : `exited with code ${result.exitCode}`;
    throw new PdfCompileError(`PDF compile ${formatCommand(planned.command, planned.args)} ${reason}`, {
      command: planned.command,
      args: planned.args,
      exitCode: result.exitCode,
      stderr: result.stderr,
    });
  }

  return { status: "compiled", command: planned.command, args: planned.args, pdfPath: input.pdfPath };
}
