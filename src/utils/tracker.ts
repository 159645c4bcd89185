/**
 * Run Tracker
 * Unified tracking for stats and issues
 */

import { ZodError } from "zod";
import type {
  DownloadFailureReason,
  DownloadResult,
} from "../types/download";

// ============================================================================
// Types
// ============================================================================

export type ResourceIssueReason =
  | "invalid-json"
  | "schema-validation"
  | "read-error";

// Discriminated union - each type has its own subset of reasons
export interface DownloadIssue {
  type: "download";
  id: string;
  filename: string;
  reason: DownloadFailureReason;
  details: string;
  attempts: number;
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details: string;
}

export type Issue = DownloadIssue | ResourceIssue;
export type IssueType = Issue["type"];

export interface RunStats {
  totalItems: number;
  downloaded: number;
  skipped: number;
  failed: number;
  bytes: number;
  issues: Issue[];
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues
        .map((e) => `${e.path.join(".")}: ${e.message}`)
        .join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return { reason: "invalid-json", details: error.message };
  }
  if (error instanceof Error) {
    return { reason: "read-error", details: error.message };
  }
  return { reason: "read-error", details: String(error) };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalItems = 0;
  private downloaded = 0;
  private skipped = 0;
  private failed = 0;
  private bytes = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  setTotalItems(count: number): void {
    this.totalItems = count;
  }

  /**
   * Record one settled download
   */
  trackResult({ entry, outcome }: DownloadResult): void {
    switch (outcome.status) {
      case "success":
        this.downloaded++;
        this.bytes += outcome.bytes;
        break;
      case "skipped":
        this.skipped++;
        break;
      case "failed":
        this.failed++;
        this.issues.push({
          type: "download",
          id: entry.id,
          filename: entry.targetFilename,
          reason: outcome.reason,
          details: outcome.error,
          attempts: outcome.attempts,
        });
        break;
    }
  }

  /**
   * Track a configuration file that failed to load
   */
  trackResourceError(path: string, error: unknown): void {
    const { reason, details } = mapResourceError(error);
    this.issues.push({ type: "resource", path, reason, details });
  }

  getIssues(): Issue[];
  getIssues(type: "download"): DownloadIssue[];
  getIssues(type: "resource"): ResourceIssue[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  hasFailures(): boolean {
    return this.failed > 0;
  }

  getStats(): RunStats {
    const duration = new Date().getTime() - this.startTime.getTime();

    return {
      totalItems: this.totalItems,
      downloaded: this.downloaded,
      skipped: this.skipped,
      failed: this.failed,
      bytes: this.bytes,
      issues: this.issues,
      duration,
    };
  }
}
