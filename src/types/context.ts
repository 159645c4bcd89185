/**
 * Run context - flows through the entire pipeline
 * Each module reads what it needs and writes its results back
 */

import type { AppConfig } from "./config";
import type { AlbumReference, MediaEntry, ResolvedMedia } from "./media";
import type { DownloadResult } from "./download";
import type { HttpClient } from "../http/client";
import type { Tracker } from "../utils/tracker";
import type { Logger } from "../utils/logger";

// Re-export types from tracker
export type {
  Issue,
  IssueType,
  DownloadIssue,
  ResourceIssue,
  ResourceIssueReason,
  RunStats,
} from "../utils/tracker";

export interface RunContext {
  // Input - provided at initialization
  config: AppConfig;
  album: AlbumReference;
  client: HttpClient;

  // Unified tracking for stats and errors
  tracker: Tracker;
  logger: Logger;

  signal?: AbortSignal;
  onProgress?: (message: string) => void;

  entries?: MediaEntry[]; // Manifest, in discovery order
  resolved?: ResolvedMedia[];
  results?: DownloadResult[];
}
