/**
 * Traversal Module
 * Turns every immediate subdirectory of the input root into a document
 *
 * Discovery is single-level: a document's files are the regular files
 * directly inside its directory. Nested directories and hidden entries
 * are not read.
 */

import glob from "fast-glob";
import { stat } from "fs/promises";
import path from "node:path";
import { ConfigurationError } from "../utils/errors";
import { IdGenerator } from "../utils/id-generator";
import type {
  DocumentInfo,
  PipelineContext,
  SourceFile,
  Stage,
} from "../types";

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Oldest first, ties broken by name
 */
export function compareFiles(a: SourceFile, b: SourceFile): number {
  return (
    a.modifiedAt.getTime() - b.modifiedAt.getTime() || compareNames(a.name, b.name)
  );
}

async function readDocument(
  directory: string,
  idGenerator: IdGenerator,
): Promise<DocumentInfo> {
  const directoryStats = await stat(directory);

  const names = await glob("*", {
    cwd: directory,
    onlyFiles: true,
    suppressErrors: false,
  });

  const files: SourceFile[] = [];
  for (const name of names) {
    const filePath = path.join(directory, name);
    const fileStats = await stat(filePath);
    files.push({ name, path: filePath, modifiedAt: fileStats.mtime });
  }
  files.sort(compareFiles);

  return {
    id: idGenerator.generate(),
    name: path.basename(directory),
    directory,
    // Some file systems report no birth time (0)
    createdAt:
      directoryStats.birthtimeMs > 0 ? directoryStats.birthtime : directoryStats.mtime,
    files,
    processed: [],
  };
}

/**
 * Scan the input root and return its documents in name order
 *
 * Unreadable and empty directories are skipped, logged and tracked.
 * A missing input root is a configuration error.
 */
export async function scanDocuments(
  ctx: PipelineContext,
  idGenerator = new IdGenerator(),
): Promise<DocumentInfo[]> {
  const { config, logger, tracker } = ctx;
  const inputDir = path.resolve(config.input);

  try {
    const rootStats = await stat(inputDir);
    if (!rootStats.isDirectory()) {
      throw new Error("not a directory");
    }
  } catch (error) {
    throw new ConfigurationError(`Input root ${inputDir} is not a readable directory`, {
      cause: error,
    });
  }

  const directories = await glob("*", {
    cwd: inputDir,
    onlyDirectories: true,
    absolute: true,
  });
  directories.sort(compareNames);

  const documents: DocumentInfo[] = [];
  for (const directory of directories) {
    try {
      const document = await readDocument(directory, idGenerator);

      if (document.files.length === 0) {
        logger.warn(`Skipping ${document.name}: no files`);
        tracker.incrementSkippedDirectories();
        continue;
      }

      logger.debug(`Found ${document.name} with ${document.files.length} files`);
      documents.push(document);
    } catch (error) {
      logger.warn(`Skipping unreadable directory ${directory}`);
      tracker.trackError(directory, error, "directory");
      tracker.incrementSkippedDirectories();
    }
  }

  tracker.setDocuments(documents.length);
  return documents;
}

/**
 * Writes to context:
 * - documents: one entry per readable, non-empty subdirectory
 */
export function traversal(idGenerator?: IdGenerator): Stage<PipelineContext> {
  return {
    name: "traversal",
    async process(ctx, next) {
      ctx.documents = await scanDocuments(ctx, idGenerator);
      ctx.logger.info(`Discovered ${ctx.documents.length} documents`);
      await next();
    },
  };
}
