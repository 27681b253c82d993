/**
 * Document Generator
 * Renders extracted text into Word, PDF, plain text or Markdown files
 */

import { mkdir, writeFile } from "fs/promises";
import { join } from "path";
import { Document, Packer, Paragraph, TextRun } from "docx";
import Handlebars from "handlebars";
import PDFDocument from "pdfkit";
import { format as formatDate } from "date-fns";
import { UnsupportedFormatError } from "../utils/errors";
import { getDefaultDocumentTemplate } from "../utils/get-default-document-template";
import type { DocumentGenerator, PdfConfig } from "../types";
import type { Logger } from "../utils/logger";

type OutputFormat = "word" | "pdf" | "text" | "markdown";

const FORMATS: Record<string, OutputFormat> = {
  word: "word",
  docx: "word",
  pdf: "pdf",
  text: "text",
  txt: "text",
  markdown: "markdown",
  md: "markdown",
};

const EXTENSIONS: Record<OutputFormat, string> = {
  word: "docx",
  pdf: "pdf",
  text: "txt",
  markdown: "md",
};

export interface DocumentTemplateContext {
  title: string;
  date: string;
  content: string;
}

export interface DocumentGeneratorOptions {
  pdf: PdfConfig;
  markdownTemplate?: string; // Handlebars source, built-in template when omitted
  logger?: Logger;
}

function parseFormat(format: string): OutputFormat {
  const parsed = FORMATS[format.trim().toLowerCase()];
  if (!parsed) {
    throw new UnsupportedFormatError(format);
  }
  return parsed;
}

export class DefaultDocumentGenerator implements DocumentGenerator {
  private readonly renderMarkdown: (context: DocumentTemplateContext) => string;

  constructor(private readonly options: DocumentGeneratorOptions) {
    this.renderMarkdown = Handlebars.compile<DocumentTemplateContext>(
      options.markdownTemplate ?? getDefaultDocumentTemplate(),
      { noEscape: true },
    );
  }

  assertSupported(format: string): void {
    parseFormat(format);
  }

  async generate(
    text: string,
    documentName: string,
    format: string,
    outputDir: string,
  ): Promise<string> {
    const outputFormat = parseFormat(format);
    await mkdir(outputDir, { recursive: true });
    const outputPath = join(outputDir, `${documentName}.${EXTENSIONS[outputFormat]}`);

    switch (outputFormat) {
      case "word":
        await writeFile(outputPath, await this.renderWord(text));
        return outputPath;

      case "pdf":
        try {
          await writeFile(outputPath, await this.renderPdf(text));
          return outputPath;
        } catch (error) {
          // Degrade to plain text, e.g. when the configured font cannot be loaded
          const fallbackPath = join(outputDir, `${documentName}.${EXTENSIONS.text}`);
          const reason = error instanceof Error ? error.message : String(error);
          this.options.logger?.warn(
            `PDF rendering failed for ${documentName} (${reason}), writing ${fallbackPath}`,
          );
          await writeFile(fallbackPath, text, "utf-8");
          return fallbackPath;
        }

      case "text":
        await writeFile(outputPath, text, "utf-8");
        return outputPath;

      case "markdown":
        await writeFile(
          outputPath,
          this.renderMarkdown({
            title: documentName,
            date: formatDate(new Date(), "yyyy-MM-dd"),
            content: text,
          }),
          "utf-8",
        );
        return outputPath;
    }
  }

  private renderWord(text: string): Promise<Buffer> {
    const document = new Document({
      sections: [
        {
          children: text
            .split("\n")
            .map((line) => new Paragraph({ children: [new TextRun(line)] })),
        },
      ],
    });
    return Packer.toBuffer(document);
  }

  private renderPdf(text: string): Promise<Buffer> {
    const { font, fontSize, margin } = this.options.pdf;

    return new Promise((resolve, reject) => {
      const document = new PDFDocument({ margin });
      const chunks: Buffer[] = [];

      document.on("data", (chunk: Buffer) => chunks.push(chunk));
      document.on("end", () => resolve(Buffer.concat(chunks)));
      document.on("error", reject);

      try {
        if (font) {
          document.font(font);
        }
        document.fontSize(fontSize).text(text);
        document.end();
      } catch (error) {
        reject(error);
      }
    });
  }
}
