/**
 * Type Detector
 * Best-effort classification of a source file; never throws
 */

import { open } from "fs/promises";
import { fileTypeFromBuffer } from "file-type";
import type { DetectedType } from "../types";
import { captureCommand } from "../utils/capture-command";
import { rawExtension } from "../utils/extensions";

// file-type needs at most this many leading bytes
const SNIFF_BYTES = 4100;

// `file` prints its own errors on stdout, often with exit code 0
const MIME_PATTERN = /^[\w.+-]+\/[\w.+-]+$/;

async function sniffMime(filePath: string): Promise<string | undefined> {
  try {
    const handle = await open(filePath, "r");
    try {
      const buffer = Buffer.alloc(SNIFF_BYTES);
      const { bytesRead } = await handle.read(buffer, 0, SNIFF_BYTES, 0);
      const result = await fileTypeFromBuffer(buffer.subarray(0, bytesRead));
      return result?.mime;
    } finally {
      await handle.close();
    }
  } catch {
    return undefined;
  }
}

async function systemMime(
  fileCommand: string,
  filePath: string,
): Promise<string | undefined> {
  try {
    const output = await captureCommand(fileCommand, ["-E", "--mime-type", "--brief", filePath]);
    if (output.code !== 0) return undefined;
    const mime = output.stdout.trim();
    return MIME_PATTERN.test(mime) ? mime : undefined;
  } catch {
    return undefined;
  }
}

/**
 * Detect the type of a file from its content, its extension and the system `file` utility
 *
 * @param fileCommand - Name of the `file` executable; pass null to skip it
 */
export async function detectPath(
  filePath: string,
  fileCommand: string | null = "file",
): Promise<DetectedType> {
  const [mime, system] = await Promise.all([
    sniffMime(filePath),
    fileCommand ? systemMime(fileCommand, filePath) : Promise.resolve(undefined),
  ]);

  return {
    mime,
    extHint: rawExtension(filePath),
    systemMime: system,
  };
}
