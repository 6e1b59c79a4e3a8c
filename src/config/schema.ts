/**
 * Configuration schema: the JSON config file, validated with zod.
 */
import path from "path";
import { z } from "zod";

export const DEFAULT_CONFIG_FILENAME = "rtfmerge.config.json";

export const DEFAULT_EXTENSIONS = [".tex", ".latex", ".md", ".markdown"];

function normalizeExtension(ext: string): string {
  const lower = ext.trim().toLowerCase();
  return lower.startsWith(".") ? lower : `.${lower}`;
}

/** Accepts either a list or a path-list string (`path.delimiter`, ":" or ";"). */
const ResourcePathsSchema = z
  .union([z.array(z.string().min(1)), z.string()])
  .transform((value) =>
    typeof value === "string"
      ? value.split(path.delimiter).map((p) => p.trim()).filter((p) => p.length > 0)
      : value,
  );

export const ConfigFileSchema = z
  .object({
    inputDir: z.string().min(1).default("src"),
    outputDir: z.string().min(1).default("output"),
    extensions: z
      .array(z.string().min(1))
      .min(1)
      .default(DEFAULT_EXTENSIONS)
      .transform((exts) => exts.map(normalizeExtension)),
    extractFiletype: z.string().min(1).default("latex"),
    resourcePaths: ResourcePathsSchema.default([]),
    officialTemplate: z.string().min(1),
    placeholder: z.string().min(1),
    replaceEnclosingGroup: z.boolean().default(true),
    suppressBibliography: z.boolean().default(true),
    citationStyle: z.string().min(1).optional(),
    footnoteSize: z.number().positive().max(144).default(10),
    pdfCompile: z.string().default(""),
    markerTag: z
      .string()
      .regex(/^[A-Za-z0-9_-]+$/, "may only contain letters, digits, '_' and '-'")
      .default("rtfmerge"),
    pandocPath: z.string().min(1).default("pandoc"),
    writeTrace: z.boolean().default(false),
  })
  .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Fully resolved configuration: every path is absolute, every default applied.
 * Immutable for the duration of a run.
 */
export interface RtfMergeConfig {
  /** Path of the file the config was read from, if any. */
  configPath: string | null;
  /** Directory relative paths were resolved against; also the converter's cwd. */
  baseDir: string;
  inputDir: string;
  outputDir: string;
  extensions: string[];
  extractFiletype: string;
  resourcePaths: string[];
  officialTemplate: string;
  placeholder: string;
  replaceEnclosingGroup: boolean;
  suppressBibliography: boolean;
  citationStyle: string | null;
  footnoteSize: number;
  pdfCompile: string;
  markerTag: string;
  pandocPath: string;
  writeTrace: boolean;
}

/** Starter config written by `rtfmerge --init`. */
export const STARTER_CONFIG = {
  inputDir: "src",
  outputDir: "output",
  extractFiletype: "latex",
  resourcePaths: ["resources"],
  officialTemplate: "./template.rtf",
  placeholder: "Insert here text for your proposal",
  suppressBibliography: true,
  citationStyle: "./chicago-fullnote-bibliography-with-ibid.csl",
  footnoteSize: 9,
  pdfCompile: "",
} satisfies z.input<typeof ConfigFileSchema>;
