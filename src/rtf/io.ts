/**
 * RTF files on disk are 8-bit. Read and write them as latin1 so every byte
 * maps to one char and back, including raw cp1252 text an editor left in.
 */

import { readFileSync, writeFileSync } from "fs";
import { sha256Bytes } from "../shared/hash.js";

export const RTF_ENCODING: BufferEncoding = "latin1";

export function readRtfFile(filePath: string): string {
  return readFileSync(filePath, RTF_ENCODING);
}

export function writeRtfFile(filePath: string, content: string): void {
  writeFileSync(filePath, content, RTF_ENCODING);
}

/** SHA-256 of the bytes writeRtfFile would put on disk. */
export function sha256Rtf(content: string): string {
  return sha256Bytes(Buffer.from(content, RTF_ENCODING));
}
