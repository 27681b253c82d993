/**
 * Logging Module
 * Logs around everything registered after it
 */

import type { PipelineContext, Stage } from "../types";

export function logging(): Stage<PipelineContext> {
  return {
    name: "logging",
    async process(ctx, next) {
      const start = Date.now();
      ctx.logger.info(`Processing ${ctx.config.input}`);
      await next();
      ctx.logger.info(`Processing finished in ${Date.now() - start}ms`);
    },
  };
}
