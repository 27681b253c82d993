import { classifyFile } from "./classify-file";
import { parsePageName } from "./parse-page-name";
import type { FileGroup, SourceFile } from "../types";

export interface PartitionedFiles {
  images: FileGroup[];
  documents: FileGroup[];
  other: SourceFile[];
}

/**
 * Compare page digit runs numerically at any length
 * An empty run counts as page 0.
 */
export function comparePageDigits(a: string, b: string): number {
  const x = a.replace(/^0+/, "");
  const y = b.replace(/^0+/, "");
  if (x.length !== y.length) return x.length - y.length;
  return x < y ? -1 : x > y ? 1 : 0;
}

/**
 * Group files of one kind by their page-name key
 *
 * Groups come out in order of first appearance. Members are sorted by page
 * number; the sort is stable, so equal pages keep their incoming order.
 */
export function groupFiles(
  files: readonly SourceFile[],
  kind: FileGroup["kind"],
): FileGroup[] {
  const groups = new Map<string, { file: SourceFile; digits: string }[]>();

  for (const file of files) {
    const { key, digits } = parsePageName(file.name);
    const members = groups.get(key);
    if (members) {
      members.push({ file, digits });
    } else {
      groups.set(key, [{ file, digits }]);
    }
  }

  return Array.from(groups, ([key, members]) => ({
    key,
    kind,
    members: members
      .sort((a, b) => comparePageDigits(a.digits, b.digits))
      .map((member) => member.file),
  }));
}

/**
 * Split a document's files into image groups, document groups and the rest
 */
export function partitionFiles(files: readonly SourceFile[]): PartitionedFiles {
  const images: SourceFile[] = [];
  const documents: SourceFile[] = [];
  const other: SourceFile[] = [];

  for (const file of files) {
    switch (classifyFile(file.name)) {
      case "image":
        images.push(file);
        break;
      case "document":
        documents.push(file);
        break;
      default:
        other.push(file);
    }
  }

  return {
    images: groupFiles(images, "image"),
    documents: groupFiles(documents, "document"),
    other,
  };
}
