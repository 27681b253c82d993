import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { emptyCategorization, parseCategorization } from "./parse-categorization";
import { InvalidResponseError } from "./errors";

describe("parseCategorization", () => {
  it("parses a JSON response", () => {
    const raw = '{"category":" invoice ","tags":["acme","paid"],"insights":["Due in 30 days"]}';
    expect(parseCategorization(raw)).toEqual({
      category: "invoice",
      tags: ["acme", "paid"],
      insights: ["Due in 30 days"],
    });
  });

  it("strips a fenced code block", () => {
    const raw = '```json\n{"category":"receipt"}\n```';
    expect(parseCategorization(raw)).toEqual({ category: "receipt", tags: [], insights: [] });
  });

  it("rejects empty responses", () => {
    expect(() => parseCategorization(null)).toThrow(InvalidResponseError);
    expect(() => parseCategorization("   ")).toThrow(InvalidResponseError);
  });

  it("rejects text that is not JSON", () => {
    expect(() => parseCategorization("This looks like an invoice.")).toThrow(SyntaxError);
  });

  it("rejects JSON of the wrong shape", () => {
    expect(() => parseCategorization('{"category": 42}')).toThrow(ZodError);
    expect(() => parseCategorization('{"tags": "a,b"}')).toThrow(ZodError);
  });
});

describe("emptyCategorization", () => {
  it("returns a fresh empty value each time", () => {
    const first = emptyCategorization();
    first.tags.push("mutated");
    expect(emptyCategorization()).toEqual({ category: "", tags: [], insights: [] });
  });
});
