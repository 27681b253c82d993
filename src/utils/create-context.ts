import { Logger } from "./logger";
import { Tracker } from "./tracker";
import type { LogLevel, PipelineContext, RunConfig } from "../types";

interface CreateContextOptions {
  logger?: Logger;
  logLevel?: LogLevel;
}

/**
 * Build a fresh context for one run
 * Nothing mutable is shared with any other context
 */
export function createContext(
  config: RunConfig,
  options: CreateContextOptions = {},
): PipelineContext {
  return {
    config: { ...config },
    logger: options.logger ?? new Logger(options.logLevel),
    tracker: new Tracker(),
    extensions: new Map(),
  };
}
