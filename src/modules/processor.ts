/**
 * Processor Module
 * Groups each document's files into page-ordered sets and turns every set
 * into one generated artifact
 *
 * Documents, and groups within a document, are processed one at a time.
 */

import path from "node:path";
import { combineImages, type CombinedImage } from "../utils/combine-images";
import { ExtractionError, PipelineError } from "../utils/errors";
import { partitionFiles } from "../utils/group-files";
import type {
  DocumentGenerator,
  DocumentInfo,
  FileGroup,
  OcrEngine,
  PipelineContext,
  Stage,
  TextExtractor,
} from "../types";

/**
 * Marks the boundary between two extracted document files
 */
export const PAGE_BREAK = "\n\n----- page break -----\n\n";

export interface ProcessorOptions {
  ocr: OcrEngine;
  extractor: TextExtractor;
  generator: DocumentGenerator;
  combine?: (paths: readonly string[]) => Promise<CombinedImage>;
}

// ============================================================================
// Helper Functions
// ============================================================================

function stem(filename: string): string {
  return path.basename(filename, path.extname(filename));
}

/**
 * Artifact names for one document: the document name when it has a single
 * group, "<document> - <first page stem>" otherwise, " (n)" on clashes
 */
function createArtifactNamer(documentName: string, groupCount: number) {
  const used = new Set<string>();

  return (group: FileGroup): string => {
    const base =
      groupCount === 1 ? documentName : `${documentName} - ${stem(group.members[0].name)}`;

    let name = base;
    for (let n = 2; used.has(name.toLowerCase()); n++) {
      name = `${base} (${n})`;
    }
    used.add(name.toLowerCase());
    return name;
  };
}

async function recognizeImages(
  group: FileGroup,
  ocr: OcrEngine,
  combine: NonNullable<ProcessorOptions["combine"]>,
): Promise<string> {
  const combined = await combine(group.members.map((member) => member.path));
  return ocr.extractText(combined.buffer);
}

async function extractDocuments(
  group: FileGroup,
  extractor: TextExtractor,
): Promise<string> {
  const pages: string[] = [];
  for (const member of group.members) {
    try {
      pages.push(await extractor.extract(member.path));
    } catch (error) {
      throw error instanceof ExtractionError
        ? error
        : new ExtractionError(member.path, error);
    }
  }
  return pages.join(PAGE_BREAK);
}

// ============================================================================
// Processing Functions
// ============================================================================

async function processDocument(
  document: DocumentInfo,
  ctx: PipelineContext,
  options: ProcessorOptions,
): Promise<void> {
  const { config, tracker } = ctx;
  const logger = ctx.logger.child(document.name);
  const { ocr, extractor, generator, combine = combineImages } = options;

  const { images, documents, other } = partitionFiles(document.files);
  const groups = [...images, ...documents];
  const outputDir = path.join(path.resolve(config.output), document.name);
  const nameArtifact = createArtifactNamer(document.name, groups.length);
  const texts: string[] = [];

  for (const group of groups) {
    tracker.incrementGroups();

    let text: string;
    try {
      text =
        group.kind === "image"
          ? await recognizeImages(group, ocr, combine)
          : await extractDocuments(group, extractor);
    } catch (error) {
      // Only unreadable inputs are isolated; OCR failures abort the run
      if (!(error instanceof ExtractionError)) throw error;

      logger.warn(`Skipping group ${group.key}: ${error.message}`);
      tracker.trackError(error.path, error, "group");
      tracker.incrementFailedGroups();
      continue;
    }

    const artifact = await generator.generate(
      text,
      nameArtifact(group),
      config.format,
      outputDir,
    );
    logger.debug(`${group.kind} group ${group.key} (${group.members.length} files) -> ${artifact}`);

    document.processed.push({
      path: artifact,
      kind: "generated",
      sources: group.members.map((member) => member.path),
      content: text,
    });
    texts.push(text);
    tracker.incrementGenerated();
  }

  for (const file of other) {
    document.processed.push({
      path: file.path,
      kind: "passthrough",
      sources: [file.path],
    });
    tracker.incrementPassedThrough();
  }

  if (texts.length > 0) {
    document.content = texts.join("\n\n");
  }
}

/**
 * Process every document in context order
 * The output format is checked before any document is touched
 */
export async function processDocuments(
  ctx: PipelineContext,
  options: ProcessorOptions,
): Promise<void> {
  if (!ctx.documents) {
    throw new PipelineError("Traversal must run before processing");
  }

  options.generator.assertSupported(ctx.config.format);

  for (const document of ctx.documents) {
    await processDocument(document, ctx, options);
  }
}

/**
 * Reads from context: documents
 * Appends to each document: processed, content
 */
export function processor(options: ProcessorOptions): Stage<PipelineContext> {
  return {
    name: "processor",
    async process(ctx, next) {
      await processDocuments(ctx, options);
      await next();
    },
  };
}
