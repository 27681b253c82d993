import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile } from "fs/promises";
import path from "node:path";
import { DefaultDocumentGenerator } from "./document-generator";
import { UnsupportedFormatError } from "../utils/errors";
import { Logger } from "../utils/logger";
import { tempDir } from "../test-helpers";

const pdf = { font: null, fontSize: 12, margin: 50 };

describe("DefaultDocumentGenerator", () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await tempDir());
  });

  afterEach(async () => {
    await cleanup();
  });

  it("writes plain text", async () => {
    const generator = new DefaultDocumentGenerator({ pdf });
    const output = await generator.generate("hello\nworld", "Letter", "Text", dir);

    expect(output).toBe(path.join(dir, "Letter.txt"));
    expect(await readFile(output, "utf-8")).toBe("hello\nworld");
  });

  it("matches format names case-insensitively", async () => {
    const generator = new DefaultDocumentGenerator({ pdf });
    const output = await generator.generate("x", "Letter", " TXT ", dir);
    expect(output).toBe(path.join(dir, "Letter.txt"));
  });

  it("renders Markdown through the template without escaping", async () => {
    const generator = new DefaultDocumentGenerator({
      pdf,
      markdownTemplate: "# {{title}}\n\n{{content}}\n",
    });
    const output = await generator.generate("Tom & <Jerry>", "Notes", "Markdown", dir);

    expect(output).toBe(path.join(dir, "Notes.md"));
    expect(await readFile(output, "utf-8")).toBe("# Notes\n\nTom & <Jerry>\n");
  });

  it("writes a Word document", async () => {
    const generator = new DefaultDocumentGenerator({ pdf });
    const output = await generator.generate("line one\nline two", "Report", "Word", dir);

    expect(output).toBe(path.join(dir, "Report.docx"));
    const bytes = await readFile(output);
    expect(bytes.subarray(0, 2).toString("latin1")).toBe("PK");
  });

  it("writes a PDF", async () => {
    const generator = new DefaultDocumentGenerator({ pdf });
    const output = await generator.generate("page text", "Scan", "PDF", dir);

    expect(output).toBe(path.join(dir, "Scan.pdf"));
    const bytes = await readFile(output);
    expect(bytes.subarray(0, 5).toString("latin1")).toBe("%PDF-");
  });

  it("falls back to text when the PDF cannot be rendered", async () => {
    const generator = new DefaultDocumentGenerator({
      pdf: { ...pdf, font: path.join(dir, "missing-font.ttf") },
      logger: new Logger("error"),
    });
    const output = await generator.generate("page text", "Scan", "PDF", dir);

    expect(output).toBe(path.join(dir, "Scan.txt"));
    expect(await readFile(output, "utf-8")).toBe("page text");
  });

  it("rejects unknown formats", async () => {
    const generator = new DefaultDocumentGenerator({ pdf });

    expect(() => generator.assertSupported("Rtf")).toThrow(UnsupportedFormatError);
    await expect(generator.generate("x", "Letter", "Rtf", dir)).rejects.toThrow(
      "Output format Rtf not supported",
    );
  });
});
