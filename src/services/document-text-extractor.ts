/**
 * Document Text Extractor
 * Plain text from PDF (pdf-parse) and Word (mammoth) files
 */

import { readFile } from "fs/promises";
import { extname } from "path";
import mammoth from "mammoth";
import pdfParse from "pdf-parse/lib/pdf-parse.js";
import { ExtractionError } from "../utils/errors";
import type { TextExtractor } from "../types";

export class DocumentTextExtractor implements TextExtractor {
  async extract(path: string): Promise<string> {
    const extension = extname(path).toLowerCase();

    try {
      const buffer = await readFile(path);
      switch (extension) {
        case ".pdf": {
          const data = await pdfParse(buffer, { max: 0 }); // 0 = no page limit
          return data.text.trim();
        }
        case ".docx":
        case ".doc": {
          // Legacy .doc files are attempted too; mammoth rejects the ones it cannot read
          const result = await mammoth.extractRawText({ buffer });
          return result.value.trim();
        }
        default:
          throw new Error(`No text extractor for ${extension || "files without extension"}`);
      }
    } catch (error) {
      throw new ExtractionError(path, error);
    }
  }
}
