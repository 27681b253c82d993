/**
 * Pipeline context - flows through every stage of one run
 * Each stage reads what it needs and writes its results back
 */

import type { DocumentInfo } from "./documents";
import type { Logger } from "../utils/logger";
import type { Tracker } from "../utils/tracker";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  IssueReason,
  ProcessingStats,
} from "../utils/tracker";

export type OrganizationCriteria = "date" | "year" | "month" | "name" | "type";

/**
 * Custom destination resolver, used instead of the named criteria
 */
export type OrganizationResolver = (document: DocumentInfo) => string;

export interface RunConfig {
  input: string; // Root holding one directory per document
  output: string; // Where generated artifacts are written
  destination: string; // Delivery root
  format: string; // Output format selector ("Word", "PDF", ...)
  organization: string | OrganizationResolver;
}

export interface DeliveryEntry {
  document: DocumentInfo;
  fragment: string; // Resolved organization fragment
  artifacts: string[]; // Deduplicated, in processed order
  committed?: string[]; // Filled by the delivery stage
}

export interface PipelineContext {
  // Input - provided at initialization
  config: RunConfig;

  // Run-scoped services, never shared between contexts
  logger: Logger;
  tracker: Tracker;

  documents?: DocumentInfo[]; // Written by traversal, mutated by later stages
  deliveries?: DeliveryEntry[]; // Written by delivery

  // Data for custom stages that has no typed home
  extensions: Map<string, unknown>;
}
