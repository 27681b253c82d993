/**
 * Delivery Module
 * Resolves each document's destination and hands its artifacts to the
 * delivery service as <fragment>/<document name>
 */

import path from "node:path";
import { PipelineError } from "../utils/errors";
import {
  isOrganizationCriteria,
  resolveOrganization,
} from "../utils/resolve-organization";
import type {
  DeliveryEntry,
  DeliveryService,
  DocumentInfo,
  OrganizationResolver,
  PipelineContext,
  Stage,
} from "../types";

/**
 * One entry per document with artifacts, in document order
 * Artifacts keep their processed order; repeated paths are dropped
 */
export function planDeliveries(
  documents: readonly DocumentInfo[],
  organization: string | OrganizationResolver,
): DeliveryEntry[] {
  const entries: DeliveryEntry[] = [];

  for (const document of documents) {
    const seen = new Set<string>();
    const artifacts: string[] = [];

    for (const file of document.processed) {
      const resolved = path.resolve(file.path);
      if (seen.has(resolved)) continue;
      seen.add(resolved);
      artifacts.push(file.path);
    }

    if (artifacts.length === 0) continue;

    entries.push({
      document,
      fragment: resolveOrganization(document, organization),
      artifacts,
    });
  }

  return entries;
}

/**
 * Writes to context:
 * - deliveries: planned entries with their committed paths
 */
export function delivery(service: DeliveryService): Stage<PipelineContext> {
  return {
    name: "delivery",
    async process(ctx, next) {
      const { config, logger, tracker } = ctx;
      if (!ctx.documents) {
        throw new PipelineError("Traversal must run before delivery");
      }

      const { organization } = config;
      if (
        typeof organization === "string" &&
        !isOrganizationCriteria(organization.trim().toLowerCase())
      ) {
        logger.warn(`Unknown organization criteria "${organization}", organizing by date`);
      }

      ctx.deliveries = planDeliveries(ctx.documents, organization);

      for (const entry of ctx.deliveries) {
        const key = path.join(entry.fragment, entry.document.name);
        entry.committed = await service.deliver(entry.artifacts, key);
        tracker.addDelivered(entry.committed.length);
        logger.info(`Delivered ${entry.committed.length} files to ${key}`);
      }

      await next();
    },
  };
}
