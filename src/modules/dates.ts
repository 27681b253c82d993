/**
 * Date Tagging Module
 * Tags generated files with the first date found in their text ("yyyy/MM"),
 * which the "month" organization prefers over the directory date
 */

import { PipelineError } from "../utils/errors";
import { extractDateTag } from "../utils/extract-date-tag";
import type { PipelineContext, Stage } from "../types";

export function tagDates(ctx: PipelineContext): void {
  if (!ctx.documents) {
    throw new PipelineError("Traversal must run before date tagging");
  }

  for (const document of ctx.documents) {
    for (const file of document.processed) {
      if (file.kind !== "generated" || !file.content) continue;

      const tag = extractDateTag(file.content);
      if (!tag) continue;

      const tags = file.tags ?? [];
      if (!tags.includes(tag)) {
        file.tags = [...tags, tag];
      }
      ctx.logger.debug(`${document.name}: dated ${tag}`);
    }
  }
}

export function dateTagging(): Stage<PipelineContext> {
  return {
    name: "date-tagging",
    async process(ctx, next) {
      tagDates(ctx);
      await next();
    },
  };
}
