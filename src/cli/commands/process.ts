/**
 * Process command - Loads config, builds the pipeline and runs it
 */

import path from "node:path";
import ora from "ora";
import { z } from "zod";
import * as modules from "../../modules";
import { PipelineBuilder } from "../../pipeline";
import { DefaultDocumentGenerator } from "../../services/document-generator";
import { DocumentTextExtractor } from "../../services/document-text-extractor";
import { FolderDelivery } from "../../services/folder-delivery";
import { OpenAiCategorizer } from "../../services/openai-categorizer";
import { TesseractOcr } from "../../services/tesseract-ocr";
import {
  ConfigurationError,
  createContext,
  loadConfig,
  loadDocumentTemplate,
  Logger,
} from "../../utils";
import type { PipelineContext, StageFunction } from "../../types";

const ProcessOptionsSchema = z.object({
  input: z.string().optional(),
  output: z.string().optional(),
  destination: z.string().optional(),
  format: z.string().optional(),
  organize: z.string().optional(),
  config: z.string().optional(),
  categorize: z.boolean().optional(),
  dates: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.infer<typeof ProcessOptionsSchema>;

export async function processCommand(opts: Options): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();
  let ocr: TesseractOcr | undefined;
  let logger = new Logger();

  try {
    // Validate CLI options
    const options = ProcessOptionsSchema.parse(opts);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    // Override with CLI options
    if (options.input) config.input = options.input;
    if (options.output) config.output = options.output;
    if (options.destination) config.destination = options.destination;
    if (options.format) config.format = options.format;
    if (options.organize) config.organization = options.organize;
    if (options.categorize) config.categorization.enabled = true;
    if (options.dates === false) config.dates.enabled = false;

    const ctx = createContext(
      {
        input: config.input,
        output: config.output,
        destination: config.destination,
        format: config.format,
        organization: config.organization,
      },
      { logLevel: options.verbose ? "debug" : config.logging.level },
    );
    logger = ctx.logger;

    // Add any config loading errors to tracker
    for (const err of errors) {
      logger.warn(`Ignoring config ${err.path}`);
      ctx.tracker.trackError(err.path, err.error, "config");
    }

    ocr = new TesseractOcr(config.ocr.language, logger.child("ocr"));
    const generator = new DefaultDocumentGenerator({
      pdf: config.pdf,
      markdownTemplate: await loadDocumentTemplate(config.markdown.template),
      logger: logger.child("generator"),
    });

    // Spinner updates between stages
    const announce =
      (text: string): StageFunction<PipelineContext> =>
      async (_ctx, next) => {
        spinner.text = text;
        await next();
      };

    const builder = new PipelineBuilder<PipelineContext>()
      .use(modules.logging())
      .use(announce("Scanning documents..."), "announce")
      .use(modules.traversal())
      .use(announce("Processing documents..."), "announce")
      .use(
        modules.processor({
          ocr,
          extractor: new DocumentTextExtractor(),
          generator,
        }),
      );

    if (config.dates.enabled) {
      builder.use(modules.dateTagging());
    }

    if (config.categorization.enabled) {
      const { apiKeyEnv, model } = config.categorization;
      const apiKey = process.env[apiKeyEnv];
      if (!apiKey) {
        throw new ConfigurationError(`Categorization needs an API key in $${apiKeyEnv}`);
      }
      builder
        .use(announce("Categorizing documents..."), "announce")
        .use(modules.categorization(OpenAiCategorizer.fromApiKey(apiKey, model)));
    }

    builder
      .use(announce("Delivering documents..."), "announce")
      .use(
        modules.delivery(
          new FolderDelivery(
            path.resolve(config.destination),
            config.delivery,
            logger.child("delivery"),
          ),
        ),
      );

    logger.debug(`Stages: ${builder.names.join(" → ")}`);
    await builder.build()(ctx);

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();

    await modules.stats(ctx, options.verbose);
  } catch (error) {
    spinner.fail("Processing failed");
    logger.error("Run aborted", error);
    process.exitCode = 1;
  } finally {
    await ocr?.dispose();
  }
}
