/**
 * Shared fixtures for tests
 */

import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import path from "node:path";
import { createContext } from "./utils/create-context";
import type {
  DocumentInfo,
  PipelineContext,
  ProcessedFile,
  RunConfig,
  SourceFile,
} from "./types";

export function testContext(config: Partial<RunConfig> = {}): PipelineContext {
  return createContext(
    {
      input: "/in",
      output: "/out",
      destination: "/delivered",
      format: "Text",
      organization: "date",
      ...config,
    },
    { logLevel: "error" },
  );
}

export function sourceFile(name: string, modifiedAt = new Date(2024, 0, 1)): SourceFile {
  return { name, path: path.join("/in/doc", name), modifiedAt };
}

export function testDocument(overrides: Partial<DocumentInfo> = {}): DocumentInfo {
  return {
    id: "abc123",
    name: "OrgTestDoc",
    directory: "/in/OrgTestDoc",
    createdAt: new Date(2023, 0, 15, 10, 30),
    files: [sourceFile("page1.png")],
    processed: [],
    ...overrides,
  };
}

export function generated(filePath: string, overrides: Partial<ProcessedFile> = {}): ProcessedFile {
  return { path: filePath, kind: "generated", sources: [], ...overrides };
}

export async function tempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(path.join(tmpdir(), "docdrop-"));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}
