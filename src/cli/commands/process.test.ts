import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import path from "node:path";
import { processCommand } from "./process";
import { ConfigurationError } from "../../utils/errors";
import { tempDir } from "../../test-helpers";

describe("processCommand", () => {
  let dir: string;
  let cleanup: () => Promise<void>;

  beforeEach(async () => {
    ({ dir, cleanup } = await tempDir());
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await cleanup();
  });

  it("logs a fatal error and sets a failing exit code", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    await processCommand({
      input: path.join(dir, "missing"),
      output: path.join(dir, "output"),
      destination: path.join(dir, "delivered"),
      format: "Text",
    });

    expect(process.exitCode).toBe(1);
    expect(error.mock.calls[0][0]).toContain("Run aborted");
    expect(error.mock.calls[1][0]).toBeInstanceOf(ConfigurationError);
  });
});
