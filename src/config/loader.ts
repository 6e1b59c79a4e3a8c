/**
 * Config Loader: Read rtfmerge.config.json, validate, resolve paths.
 */

import { readFileSync, existsSync, writeFileSync, mkdirSync } from "fs";
import path from "path";
import type { ZodError } from "zod";
import { ConfigFileSchema, DEFAULT_CONFIG_FILENAME, STARTER_CONFIG } from "./schema.js";
import type { RtfMergeConfig } from "./schema.js";
import { ConfigError } from "../shared/errors.js";

export const CONFIG_ENV_VAR = "RTFMERGE_CONFIG";
export const PANDOC_ENV_VAR = "RTFMERGE_PANDOC";

/**
 * Pick the config path from CLI argument and/or environment variable.
 * CLI argument takes priority over environment variable.
 * Defaults to rtfmerge.config.json in the working directory.
 */
export function resolveConfigPath(cliArg?: string, envVar?: string, cwd: string = process.cwd()): string {
  const raw = cliArg?.trim() || envVar?.trim() || DEFAULT_CONFIG_FILENAME;
  return path.resolve(cwd, raw);
}

function formatZodError(err: ZodError): string {
  return err.issues
    .map((issue) => `  - ${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("\n");
}

/**
 * Validate a parsed config object and resolve it against `baseDir`.
 * Throws ConfigError listing every offending key.
 */
export function parseConfig(
  raw: unknown,
  baseDir: string,
  env: NodeJS.ProcessEnv = process.env,
  configPath: string | null = null,
): RtfMergeConfig {
  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const source = configPath ?? "configuration";
    throw new ConfigError(`Invalid ${source}:\n${formatZodError(result.error)}`);
  }
  const file = result.data;
  const resolve = (p: string) => path.resolve(baseDir, p);

  return Object.freeze({
    configPath,
    baseDir,
    inputDir: resolve(file.inputDir),
    outputDir: resolve(file.outputDir),
    extensions: file.extensions,
    extractFiletype: file.extractFiletype,
    resourcePaths: file.resourcePaths.map(resolve),
    officialTemplate: resolve(file.officialTemplate),
    placeholder: file.placeholder,
    replaceEnclosingGroup: file.replaceEnclosingGroup,
    suppressBibliography: file.suppressBibliography,
    citationStyle: file.citationStyle ? resolve(file.citationStyle) : null,
    footnoteSize: file.footnoteSize,
    pdfCompile: file.pdfCompile.trim(),
    markerTag: file.markerTag,
    pandocPath: env[PANDOC_ENV_VAR]?.trim() || file.pandocPath,
    writeTrace: file.writeTrace,
  });
}

/**
 * Load and validate a config file. Relative paths inside it resolve
 * against the file's own directory.
 */
export function loadConfig(filePath: string, env: NodeJS.ProcessEnv = process.env): RtfMergeConfig {
  if (!existsSync(filePath)) {
    throw new ConfigError(
      `Config file not found: ${filePath} (run with --init to create one)`,
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf-8"));
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Config file is not valid JSON: ${filePath} (${detail})`);
  }

  return parseConfig(raw, path.dirname(filePath), env, filePath);
}

/**
 * Write the starter config. Refuses to overwrite an existing file.
 */
export function writeStarterConfig(filePath: string): string {
  if (existsSync(filePath)) {
    throw new ConfigError(`Refusing to overwrite existing config: ${filePath}`);
  }
  mkdirSync(path.dirname(filePath), { recursive: true });
  writeFileSync(filePath, JSON.stringify(STARTER_CONFIG, null, 2) + "\n");
  return filePath;
}
