/**
 * Categorization Module
 * Attaches category, tags and insights to every generated file
 *
 * A failed or malformed answer leaves the file with empty metadata and
 * never stops the run.
 */

import { PipelineError } from "../utils/errors";
import { emptyCategorization } from "../utils/parse-categorization";
import type {
  Categorization,
  Categorizer,
  DocumentInfo,
  PipelineContext,
  Stage,
} from "../types";

function union(a: readonly string[], b: readonly string[]): string[] {
  return [...new Set([...a, ...b])];
}

/**
 * Document metadata: first non-empty category, all tags and insights
 */
function summarize(document: DocumentInfo): void {
  document.category =
    document.processed.find((file) => file.category)?.category ?? "";
  document.tags = document.processed.reduce<string[]>(
    (tags, file) => union(tags, file.tags ?? []),
    [],
  );
  document.insights = document.processed.flatMap((file) => file.insights ?? []);
}

export async function categorizeDocuments(
  ctx: PipelineContext,
  categorizer: Categorizer,
): Promise<void> {
  const { logger, tracker } = ctx;
  if (!ctx.documents) {
    throw new PipelineError("Traversal must run before categorization");
  }

  for (const document of ctx.documents) {
    for (const file of document.processed) {
      if (file.kind !== "generated" || !file.content) continue;

      let result: Categorization;
      try {
        result = await categorizer.categorize(file.content);
        tracker.incrementCategorized();
      } catch (error) {
        const details = error instanceof Error ? error.message : String(error);
        logger.warn(`Categorization failed for ${file.path}: ${details}`);
        tracker.trackError(file.path, error, "categorization");
        result = emptyCategorization();
      }

      file.category = result.category;
      file.tags = union(file.tags ?? [], result.tags);
      file.insights = result.insights;
    }

    summarize(document);
  }
}

export function categorization(categorizer: Categorizer): Stage<PipelineContext> {
  return {
    name: "categorization",
    async process(ctx, next) {
      await categorizeDocuments(ctx, categorizer);
      await next();
    },
  };
}
