/**
 * Document-related type definitions
 */

export interface SourceFile {
  readonly name: string; // Base filename with extension
  readonly path: string; // Absolute path
  readonly modifiedAt: Date;
}

export interface Categorization {
  category: string;
  tags: string[];
  insights: string[];
}

export interface ProcessedFile {
  path: string; // Generated artifact, or the original path for pass-through files
  kind: "generated" | "passthrough";
  sources: string[]; // Input files the artifact was built from, in page order
  content?: string; // Text submitted to the generator (generated only)

  // Categorization fills these fields:
  category?: string;
  tags?: string[];
  insights?: string[];
}

export interface DocumentInfo {
  // Traversal fills these fields:
  id: string; // Short unique ID (e.g., "k3x9a2")
  name: string; // Directory name
  directory: string; // Absolute path of the source directory
  createdAt: Date; // Directory creation time (mtime where unavailable)
  files: SourceFile[]; // Ordered by modifiedAt, then name

  // Processor appends here, never removes
  processed: ProcessedFile[];
  content?: string; // Text of every group, joined

  // Categorization fills these fields:
  category?: string;
  tags?: string[];
  insights?: string[];
}

export type FileKind = "image" | "document" | "other";

/**
 * Page-ordered subset of a document's files sharing one group key
 */
export interface FileGroup {
  key: string;
  kind: Exclude<FileKind, "other">;
  members: SourceFile[];
}

/**
 * Result of splitting a filename around its first run of digits
 * Example: "scan12_b.png" -> { prefix: "scan", digits: "12", suffix: "_b.png", page: 12, key: "scan_b.png" }
 */
export interface PageName {
  prefix: string;
  digits: string; // Empty when the name has no digits
  suffix: string;
  page: number; // 0 when the name has no digits
  key: string;
}
