import { readFile } from "fs/promises";
import { getDefaultDocumentTemplate } from "./get-default-document-template";

/**
 * Load the Markdown document template
 * Falls back to the built-in template when no path is configured
 */
export async function loadDocumentTemplate(templatePath: string | null): Promise<string> {
  if (!templatePath) {
    return getDefaultDocumentTemplate();
  }
  return readFile(templatePath, "utf-8");
}
