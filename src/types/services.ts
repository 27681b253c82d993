/**
 * External capability contracts
 * Stages receive these through their factory parameters
 */

import type { Categorization } from "./documents";

export interface OcrEngine {
  extractText(image: Buffer): Promise<string>;
}

export interface TextExtractor {
  extract(path: string): Promise<string>;
}

export interface DocumentGenerator {
  /**
   * Render text into `<outputDir>/<documentName>.<ext>` and return the path.
   * Throws UnsupportedFormatError for unknown formats.
   */
  generate(
    text: string,
    documentName: string,
    format: string,
    outputDir: string,
  ): Promise<string>;

  /**
   * Throws UnsupportedFormatError when `format` cannot be generated
   */
  assertSupported(format: string): void;
}

export interface Categorizer {
  categorize(text: string): Promise<Categorization>;
}

export interface DeliveryService {
  /**
   * Commit `sources` under `destinationKey` and return the committed paths
   */
  deliver(sources: string[], destinationKey: string): Promise<string[]>;
}
