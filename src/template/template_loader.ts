/**
 * Template Loader: Read the official RTF template from disk.
 */

import { existsSync } from "fs";
import { ConfigError } from "../shared/errors.js";
import { locatePlaceholder } from "./placeholder.js";
import { looksLikeRtf } from "../rtf/groups.js";
import { readRtfFile } from "../rtf/io.js";
import type { PlaceholderLocation, SpliceOptions } from "./placeholder.js";
import type { StepLogger } from "../shared/logger.js";

export interface OfficialTemplate {
  path: string;
  content: string;
  location: PlaceholderLocation;
}

/**
 * Load the template and verify the placeholder is present.
 * Throws ConfigError if the file is missing or the placeholder is absent.
 */
export function loadOfficialTemplate(
  filePath: string,
  placeholder: string,
  options: SpliceOptions & { logger?: StepLogger } = {},
): OfficialTemplate {
  if (!existsSync(filePath)) {
    throw new ConfigError(`Official template not found: ${filePath}`);
  }

  const content = readRtfFile(filePath);
  if (!looksLikeRtf(content)) {
    options.logger?.warn("TEMPLATE", `${filePath} does not start with {\\rtf; is it an RTF file?`);
  }

  const location = locatePlaceholder(content, placeholder, options);
  if (!location) {
    throw new ConfigError(`Could not find string \`${placeholder}\` in ${filePath}`);
  }
  if (location.occurrences > 1) {
    options.logger?.warn(
      "TEMPLATE",
      `Placeholder appears ${location.occurrences} times in ${filePath}; only the first is replaced`,
    );
  }

  return { path: filePath, content, location };
}
