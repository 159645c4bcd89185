/**
 * Download outcome type definitions
 */

import type { ResolvedMedia } from "./media";

// Type-safe reasons for failed items
export type DownloadFailureReason =
  | "http-error"
  | "not-found"
  | "network-error"
  | "timeout"
  | "write-error"
  | "cancelled";

// Discriminated union - one variant per outcome
export type DownloadOutcome =
  | { status: "success"; bytes: number; attempts: number }
  | { status: "skipped" }
  | {
      status: "failed";
      reason: DownloadFailureReason;
      error: string;
      attempts: number;
    };

export interface DownloadResult {
  entry: ResolvedMedia;
  outcome: DownloadOutcome;
}

export interface DownloadOptions {
  concurrency: number;
  retries: number;
  retryDelay: number; // Base backoff in milliseconds
  overwrite?: boolean; // Re-download files that already exist
  signal?: AbortSignal;
  onResult?: (result: DownloadResult) => void;
}
