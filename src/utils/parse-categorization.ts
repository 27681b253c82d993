import { z } from "zod";
import { InvalidResponseError } from "./errors";
import type { Categorization } from "../types";

const CategorizationResponseSchema = z.object({
  category: z.string().trim(),
  tags: z.array(z.string()).default([]),
  insights: z.array(z.string()).default([]),
});

/**
 * Fresh copy of the empty categorization
 */
export function emptyCategorization(): Categorization {
  return { category: "", tags: [], insights: [] };
}

/**
 * Parse a categorization response, optionally wrapped in a ```json fence
 *
 * @throws InvalidResponseError for an empty response
 * @throws SyntaxError when the response is not JSON
 * @throws ZodError when the JSON does not have the expected shape
 */
export function parseCategorization(raw: string | null | undefined): Categorization {
  const body = (raw ?? "")
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "");

  if (!body) {
    throw new InvalidResponseError("Empty categorization response");
  }

  return CategorizationResponseSchema.parse(JSON.parse(body));
}
