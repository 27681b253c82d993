import { describe, it, expect, vi } from "vitest";
import { categorizeDocuments } from "./categorization";
import { InvalidResponseError, PipelineError } from "../utils/errors";
import { generated, testContext, testDocument } from "../test-helpers";
import type { Categorizer } from "../types";

describe("categorizeDocuments", () => {
  it("attaches metadata to generated files and summarizes the document", async () => {
    const ctx = testContext();
    const document = testDocument({
      processed: [
        generated("/out/a.txt", { content: "first", tags: ["2023/01"] }),
        generated("/out/b.txt", { content: "second" }),
        { path: "/in/doc/x.zip", kind: "passthrough", sources: ["/in/doc/x.zip"] },
      ],
    });
    ctx.documents = [document];

    const categorizer: Categorizer = {
      categorize: vi.fn(async (text: string) =>
        text === "first"
          ? { category: "Invoice", tags: ["acme", "2023/01"], insights: ["Total 99.50"] }
          : { category: "Receipt", tags: ["acme", "paid"], insights: [] },
      ),
    };

    await categorizeDocuments(ctx, categorizer);

    expect(categorizer.categorize).toHaveBeenCalledTimes(2);
    expect(document.processed[0]).toMatchObject({
      category: "Invoice",
      tags: ["2023/01", "acme"],
      insights: ["Total 99.50"],
    });
    expect(document.processed[2].category).toBeUndefined();
    expect(document.category).toBe("Invoice");
    expect(document.tags).toEqual(["2023/01", "acme", "paid"]);
    expect(document.insights).toEqual(["Total 99.50"]);
    expect(ctx.tracker.getStats().categorized).toBe(2);
  });

  it("leaves empty metadata when the answer is unusable", async () => {
    const ctx = testContext();
    const document = testDocument({
      processed: [generated("/out/a.txt", { content: "text" })],
    });
    ctx.documents = [document];

    await categorizeDocuments(ctx, {
      categorize: async () => {
        throw new InvalidResponseError("Empty response");
      },
    });

    expect(document.processed[0]).toMatchObject({ category: "", tags: [], insights: [] });
    expect(document.category).toBe("");
    expect(ctx.tracker.getIssues("categorization")).toEqual([
      {
        type: "categorization",
        path: "/out/a.txt",
        reason: "invalid-response",
        details: "Empty response",
      },
    ]);
  });

  it("requires traversal to have run", async () => {
    const categorizer: Categorizer = { categorize: vi.fn() };

    await expect(categorizeDocuments(testContext(), categorizer)).rejects.toBeInstanceOf(
      PipelineError,
    );
    expect(categorizer.categorize).not.toHaveBeenCalled();
  });
});
