/**
 * Extension Utilities
 * Normalization and classification of file extensions
 */

import path from "node:path";
import type { Backend, MediaKind } from "../types";

const IMAGE_EXTENSIONS = new Set([
  "jpg",
  "jpeg",
  "png",
  "gif",
  "webp",
  "bmp",
  "tiff",
  "tif",
  "heic",
  "avif",
]);

const AUDIO_EXTENSIONS = new Set(["mp3", "wav", "flac", "aac", "ogg", "m4a", "opus"]);

const VIDEO_EXTENSIONS = new Set(["mp4", "mov", "mkv", "webm", "avi"]);

// Inputs LibreOffice can turn into a PDF
const DOCUMENT_EXTENSIONS = new Set([
  "doc",
  "docx",
  "ppt",
  "pptx",
  "xls",
  "xlsx",
  "odt",
  "odp",
  "ods",
  "rtf",
  "txt",
]);

const ALIASES: Record<string, string> = {
  jpeg: "jpg",
  htm: "html",
};

/**
 * Raw lowercased extension without the dot
 *
 * @example
 * rawExtension("photo.JPEG") // "jpeg"
 * rawExtension("README") // undefined
 */
export function rawExtension(filePath: string): string | undefined {
  const ext = path.extname(filePath);
  if (ext.length <= 1) return undefined;
  return ext.slice(1).toLowerCase();
}

/**
 * Lowercased extension with aliases applied (jpeg → jpg, htm → html)
 */
export function normalizeExtension(filePath: string): string | undefined {
  const ext = rawExtension(filePath);
  if (ext === undefined) return undefined;
  return ALIASES[ext] ?? ext;
}

export function isImageExt(ext: string | undefined): boolean {
  return ext !== undefined && IMAGE_EXTENSIONS.has(ext);
}

export function isAudioExt(ext: string | undefined): boolean {
  return ext !== undefined && AUDIO_EXTENSIONS.has(ext);
}

export function isVideoExt(ext: string | undefined): boolean {
  return ext !== undefined && VIDEO_EXTENSIONS.has(ext);
}

export function isMediaExt(ext: string | undefined): boolean {
  return isAudioExt(ext) || isVideoExt(ext);
}

export function isDocumentExt(ext: string | undefined): boolean {
  return ext !== undefined && DOCUMENT_EXTENSIONS.has(ext);
}

export function isPdfImagePair(
  sourceExt: string | undefined,
  destExt: string | undefined,
): boolean {
  return (
    (sourceExt === "pdf" && isImageExt(destExt)) ||
    (destExt === "pdf" && isImageExt(sourceExt))
  );
}

export function classifyDestKind(ext: string | undefined): MediaKind {
  if (isImageExt(ext)) return "image";
  if (isAudioExt(ext)) return "audio";
  if (isVideoExt(ext)) return "video";
  if (isDocumentExt(ext) || ext === "pdf") return "document";
  return "other";
}

/**
 * Pick the conversion backend from the extension pair alone
 * First matching rule wins
 */
export function selectBackend(
  sourceExt: string | undefined,
  destExt: string | undefined,
): Backend | undefined {
  if (isImageExt(sourceExt) && isImageExt(destExt)) return "imagemagick";
  if (isPdfImagePair(sourceExt, destExt)) return "imagemagick";
  if (isMediaExt(sourceExt) && isMediaExt(destExt)) return "ffmpeg";
  if (isDocumentExt(sourceExt) && destExt === "pdf") return "libreoffice";
  return undefined;
}
