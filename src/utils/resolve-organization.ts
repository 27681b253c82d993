/**
 * Organization Resolver
 * Maps a processed document to the destination path fragment it is delivered under
 */

import { format } from "date-fns";
import type {
  DocumentInfo,
  OrganizationCriteria,
  OrganizationResolver,
} from "../types";

export const UNCATEGORIZED = "uncategorized";

const MONTH_TAG = /^\d{4}\/\d{2}$/;

const resolvers: Record<OrganizationCriteria, OrganizationResolver> = {
  date: (document) => format(document.createdAt, "yyyy-MM-dd"),
  year: (document) => format(document.createdAt, "yyyy"),
  month: (document) =>
    findMonthTag(document) ?? format(document.createdAt, "yyyy-MM"),
  name: (document) => document.name,
  type: (document) => findCategory(document) ?? UNCATEGORIZED,
};

export function isOrganizationCriteria(value: string): value is OrganizationCriteria {
  return Object.hasOwn(resolvers, value);
}

/**
 * First "yyyy/MM" tag across the processed files, in file then tag order,
 * as "yyyy-MM"
 */
function findMonthTag(document: DocumentInfo): string | undefined {
  for (const file of document.processed) {
    const tag = file.tags?.find((t) => MONTH_TAG.test(t));
    if (tag) return tag.replace("/", "-");
  }
  return undefined;
}

function findCategory(document: DocumentInfo): string | undefined {
  const category = document.category || document.processed[0]?.category;
  return category || undefined;
}

/**
 * Resolve the destination fragment for a document
 *
 * Criteria are matched case-insensitively; unknown criteria resolve like "date".
 * A resolver function is called as-is.
 */
export function resolveOrganization(
  document: DocumentInfo,
  criteria: string | OrganizationResolver,
): string {
  if (typeof criteria === "function") {
    return criteria(document);
  }

  const normalized = criteria.trim().toLowerCase();
  const resolver = isOrganizationCriteria(normalized)
    ? resolvers[normalized]
    : resolvers.date;
  return resolver(document);
}
