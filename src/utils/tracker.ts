/**
 * Run Tracker
 * Unified tracking for stats and issues
 */

import { writeFile, mkdir } from "fs/promises";
import { join } from "path";
import { ZodError } from "zod";
import { ExtractionError, InvalidResponseError } from "./errors";

// ============================================================================
// Types
// ============================================================================

export type IssueType = "directory" | "group" | "categorization" | "config";

export type IssueReason =
  | "not-found"
  | "permission-denied"
  | "read-error"
  | "decode-error"
  | "invalid-response"
  | "schema-validation"
  | "invalid-json";

export interface Issue {
  type: IssueType;
  path: string;
  reason: IssueReason;
  details: string;
}

export interface ProcessingStats {
  documents: number;
  groups: number;
  generated: number;
  passedThrough: number;
  failedGroups: number;
  skippedDirectories: number;
  categorized: number;
  delivered: number;
  issues: Issue[];
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo {
  reason: IssueReason;
  details: string;
}

function mapError(error: unknown): IssueInfo {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues.map((e) => e.message).join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return { reason: "invalid-json", details: error.message };
  }
  if (error instanceof InvalidResponseError) {
    return { reason: "invalid-response", details: error.message };
  }
  if (error instanceof ExtractionError) {
    const cause = error.cause;
    if (cause instanceof Error && "code" in cause) {
      return mapError(cause);
    }
    return { reason: "decode-error", details: error.message };
  }
  if (error instanceof Error) {
    if ("code" in error) {
      if (error.code === "ENOENT") {
        return { reason: "not-found", details: error.message };
      }
      if (error.code === "EACCES" || error.code === "EPERM") {
        return { reason: "permission-denied", details: error.message };
      }
    }
    return { reason: "read-error", details: error.message };
  }
  return { reason: "read-error", details: String(error) };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private documents = 0;
  private groups = 0;
  private generated = 0;
  private passedThrough = 0;
  private failedGroups = 0;
  private skippedDirectories = 0;
  private categorized = 0;
  private delivered = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setDocuments(count: number): void {
    this.documents = count;
  }

  incrementGroups(): void {
    this.groups++;
  }

  incrementGenerated(): void {
    this.generated++;
  }

  incrementPassedThrough(): void {
    this.passedThrough++;
  }

  incrementFailedGroups(): void {
    this.failedGroups++;
  }

  incrementSkippedDirectories(): void {
    this.skippedDirectories++;
  }

  incrementCategorized(): void {
    this.categorized++;
  }

  addDelivered(count: number): void {
    this.delivered += count;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackError(path: string, error: unknown, type: IssueType): void {
    const { reason, details } = mapError(error);
    this.issues.push({ type, path, reason, details });
  }

  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): ProcessingStats {
    const duration = Date.now() - this.startTime.getTime();

    return {
      documents: this.documents,
      groups: this.groups,
      generated: this.generated,
      passedThrough: this.passedThrough,
      failedGroups: this.failedGroups,
      skippedDirectories: this.skippedDirectories,
      categorized: this.categorized,
      delivered: this.delivered,
      issues: this.issues,
      duration,
    };
  }

  async exportStats(outputDir: string): Promise<string> {
    const { issues, ...summary } = this.getStats();

    const exported = {
      summary,
      issues: this.groupIssuesByType(issues),
    };

    await mkdir(outputDir, { recursive: true });
    const outputPath = join(outputDir, "stats.json");
    await writeFile(outputPath, JSON.stringify(exported, null, 2), "utf-8");
    return outputPath;
  }

  private groupIssuesByType(issues: Issue[]): Partial<Record<IssueType, Issue[]>> {
    const grouped: Partial<Record<IssueType, Issue[]>> = {};
    for (const issue of issues) {
      const bucket = grouped[issue.type] ?? [];
      bucket.push(issue);
      grouped[issue.type] = bucket;
    }
    return grouped;
  }
}
