/**
 * Shared test fixtures: temp workspaces, an in-process converter and a
 * scripted command runner. Nothing here spawns a process.
 */

import { mkdtempSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import os from "os";
import path from "path";
import { parseConfig } from "../src/config/loader.js";
import { escapeRtfText, decodeRtfText } from "../src/rtf/groups.js";
import { ConversionError } from "../src/shared/errors.js";
import { createStepLogger } from "../src/shared/logger.js";
import type { RtfMergeConfig } from "../src/config/schema.js";
import type { DocumentConverter, ToRtfOptions } from "../src/convert/converter.js";
import type { ReverseOptions } from "../src/convert/pandoc_args.js";
import type { CommandOptions, CommandResult, CommandRunner } from "../src/convert/process.js";
import type { LogSink, StepLogger } from "../src/shared/logger.js";

export const PLACEHOLDER = "Insert text here";

export const TEMPLATE_RTF =
  "{\\rtf1\\ansi\\deff0 {\\fonttbl{\\f0 Times;}}\n" +
  `{\\pard\\plain ${PLACEHOLDER}\\par}\n` +
  "}";

export function makeTmpDir(prefix = "rtfmerge-test-"): string {
  return mkdtempSync(path.join(os.tmpdir(), prefix));
}

export interface Workspace {
  root: string;
  srcDir: string;
  outDir: string;
  templatePath: string;
}

/** tmp/{src/, template.rtf, style.csl}; fragments are name → content. */
export function makeWorkspace(fragments: Record<string, string>, template = TEMPLATE_RTF): Workspace {
  const root = makeTmpDir();
  const srcDir = path.join(root, "src");
  mkdirSync(srcDir);
  for (const [name, content] of Object.entries(fragments)) {
    writeFileSync(path.join(srcDir, name), content);
  }
  const templatePath = path.join(root, "template.rtf");
  writeFileSync(templatePath, template);
  writeFileSync(path.join(root, "style.csl"), "<style/>");
  return { root, srcDir, outDir: path.join(root, "output"), templatePath };
}

export function makeConfig(ws: Workspace, overrides: Record<string, unknown> = {}): RtfMergeConfig {
  return parseConfig(
    {
      inputDir: "src",
      outputDir: "output",
      officialTemplate: "template.rtf",
      placeholder: PLACEHOLDER,
      citationStyle: "style.csl",
      ...overrides,
    },
    ws.root,
    {},
  );
}

export interface CapturedSink extends LogSink {
  lines: string[];
}

export function captureSink(): CapturedSink {
  const lines: string[] = [];
  return {
    lines,
    info: (line) => lines.push(line),
    warn: (line) => lines.push(line),
    error: (line) => lines.push(line),
  };
}

export function quietLogger(): StepLogger {
  return createStepLogger({ sink: captureSink() });
}

/**
 * Converter that wraps the fragment text in one paragraph:
 * "Hello" ⇄ "{\pard STUB:Hello\par}".
 */
export class StubConverter implements DocumentConverter {
  readonly toRtfCalls: { path: string; options: ToRtfOptions }[] = [];
  readonly fromRtfCalls: { rtf: string; options: ReverseOptions }[] = [];
  /** Fragment basename that should fail with this exit code. */
  failOn: { name: string; exitCode: number } | null = null;
  /** 1-based fromRtf call that should fail. */
  failFromRtfAt: number | null = null;

  async toRtf(fragmentPath: string, options: ToRtfOptions): Promise<string> {
    this.toRtfCalls.push({ path: fragmentPath, options });
    if (this.failOn && path.basename(fragmentPath) === this.failOn.name) {
      throw new ConversionError(`stub failed on ${this.failOn.name}`, {
        command: "pandoc",
        args: [fragmentPath],
        exitCode: this.failOn.exitCode,
        stderr: "stub stderr",
      });
    }
    const text = readFileSync(fragmentPath, "utf-8");
    return `{\\pard STUB:${escapeRtfText(text)}\\par}`;
  }

  async fromRtf(rtf: string, options: ReverseOptions): Promise<string> {
    this.fromRtfCalls.push({ rtf, options });
    if (this.fromRtfCalls.length === this.failFromRtfAt) {
      throw new ConversionError(`stub failed on section ${this.failFromRtfAt}`, {
        command: "pandoc",
        args: ["-f", "rtf", "-t", options.to],
        exitCode: 64,
        stderr: "stub stderr",
      });
    }
    const match = /STUB:([\s\S]*?)\\par\}/.exec(rtf);
    return match ? decodeRtfText(match[1]) : rtf;
  }
}

export interface RecordedCall {
  command: string;
  args: string[];
  options?: CommandOptions;
}

/** Runner that answers from a script keyed by "command args..." or by command name. */
export function scriptedRunner(
  responses: Record<string, Partial<CommandResult>>,
): { runner: CommandRunner; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const runner: CommandRunner = async (command, args, options) => {
    calls.push({ command, args, options });
    const response = responses[[command, ...args].join(" ")] ?? responses[command];
    if (!response) {
      return { exitCode: null, stdout: "", stderr: "", spawnError: `spawn ${command} ENOENT` };
    }
    return { exitCode: 0, stdout: "", stderr: "", ...response };
  };
  return { runner, calls };
}
