/**
 * Tesseract OCR Engine
 * Local OCR through tesseract.js, worker created on first use
 */

import { createWorker, type Worker } from "tesseract.js";
import type { OcrEngine } from "../types";
import type { Logger } from "../utils/logger";

export class TesseractOcr implements OcrEngine {
  private worker: Promise<Worker> | null = null;

  constructor(
    private readonly language: string,
    private readonly logger?: Logger,
  ) {}

  private getWorker(): Promise<Worker> {
    if (!this.worker) {
      this.logger?.debug(`Starting Tesseract worker (${this.language})`);
      this.worker = createWorker(this.language);
    }
    return this.worker;
  }

  async extractText(image: Buffer): Promise<string> {
    const worker = await this.getWorker();
    const result = await worker.recognize(image);
    return result.data.text;
  }

  /**
   * Terminate the worker, if one was started
   */
  async dispose(): Promise<void> {
    if (!this.worker) return;
    const worker = await this.worker;
    this.worker = null;
    await worker.terminate();
  }
}
