/**
 * Stage Chain Engine
 * Composes stages into a single callable pipeline
 */

import { PipelineError } from "./utils/errors";
import type { Next, Pipeline, Stage, StageFunction } from "./types";

const terminal: Pipeline<unknown> = async () => {};

function toStage<C>(stage: Stage<C> | StageFunction<C>, name?: string): Stage<C> {
  if (typeof stage !== "function") {
    return stage;
  }
  return {
    name: name ?? (stage.name || "anonymous"),
    process: stage,
  };
}

/**
 * Builds an ordered chain of stages
 *
 * The first registered stage runs first. Each stage awaits `next()` to hand
 * control to the following one, or returns without calling it to skip the
 * rest of the chain. Errors thrown by any stage reject the pipeline call and
 * nothing after that stage runs.
 *
 * @example
 * const pipeline = new PipelineBuilder<PipelineContext>()
 *   .use(traversal())
 *   .use(async (ctx, next) => {
 *     ctx.logger.info(`${ctx.documents?.length} documents`);
 *     await next();
 *   })
 *   .build();
 *
 * await pipeline(createContext(config));
 */
export class PipelineBuilder<C> {
  private readonly stages: Stage<C>[] = [];

  use(stage: Stage<C>): this;
  use(stage: StageFunction<C>, name?: string): this;
  use(stage: Stage<C> | StageFunction<C>, name?: string): this {
    this.stages.push(toStage(stage, name));
    return this;
  }

  /**
   * Names of the registered stages, in execution order
   */
  get names(): string[] {
    return this.stages.map((stage) => stage.name);
  }

  /**
   * Compose the registered stages. The result is a snapshot: stages added
   * afterwards do not affect it, and it may run against many contexts.
   */
  build(): Pipeline<C> {
    return [...this.stages].reduceRight<Pipeline<C>>(
      (next, stage) => (ctx) => stage.process(ctx, once(stage, () => next(ctx))),
      terminal,
    );
  }
}

function once<C>(stage: Stage<C>, next: Next): Next {
  let called = false;
  return () => {
    if (called) {
      return Promise.reject(
        new PipelineError(`Stage "${stage.name}" called next() more than once`),
      );
    }
    called = true;
    return next();
  };
}
