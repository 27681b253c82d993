import { describe, it, expect } from "vitest";
import { tagDates } from "./dates";
import { PipelineError } from "../utils/errors";
import { generated, testContext, testDocument } from "../test-helpers";

describe("tagDates", () => {
  it("tags generated files with the first date in their text", () => {
    const ctx = testContext();
    const document = testDocument({
      processed: [
        generated("/out/a.txt", { content: "Invoice date: 15/01/2023" }),
        generated("/out/b.txt", { content: "No dates here", tags: ["keep"] }),
      ],
    });
    ctx.documents = [document];

    tagDates(ctx);

    expect(document.processed.map((f) => f.tags)).toEqual([["2023/01"], ["keep"]]);
  });

  it("skips pass-through files and does not repeat a tag", () => {
    const ctx = testContext();
    const document = testDocument({
      processed: [
        generated("/out/a.txt", { content: "Issued 2023-03-07", tags: ["2023/03"] }),
        { path: "/in/doc/a.zip", kind: "passthrough", sources: ["/in/doc/a.zip"] },
      ],
    });
    ctx.documents = [document];

    tagDates(ctx);

    expect(document.processed[0].tags).toEqual(["2023/03"]);
    expect(document.processed[1].tags).toBeUndefined();
  });

  it("requires traversal to have run", () => {
    expect(() => tagDates(testContext())).toThrow(PipelineError);
  });
});
