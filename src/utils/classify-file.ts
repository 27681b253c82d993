import { extname } from "node:path";
import type { FileKind } from "../types";

export const IMAGE_EXTENSIONS = [
  ".jpg",
  ".jpeg",
  ".png",
  ".bmp",
  ".tif",
  ".tiff",
  ".gif",
  ".webp",
] as const;

export const DOCUMENT_EXTENSIONS = [".pdf", ".docx", ".doc"] as const;

const imageExtensions = new Set<string>(IMAGE_EXTENSIONS);
const documentExtensions = new Set<string>(DOCUMENT_EXTENSIONS);

/**
 * Classify a file by its (case-insensitive) extension
 */
export function classifyFile(filename: string): FileKind {
  const extension = extname(filename).toLowerCase();
  if (imageExtensions.has(extension)) return "image";
  if (documentExtensions.has(extension)) return "document";
  return "other";
}
