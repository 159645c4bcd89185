/**
 * Central type exports
 */

// Configuration
export type {
  AppConfig,
  PartialAppConfig,
  OutputConfig,
  HttpConfig,
  PaginationConfig,
  DownloadConfig,
  NamingConfig,
  NamingStyle,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export { AppConfigSchema, PartialAppConfigSchema } from "./config";

// Album and media
export type {
  MediaKind,
  AlbumReference,
  MediaEntry,
  ResolvedMedia,
  RawPage,
  Continuation,
  PageListing,
  ManifestParser,
  PaginationState,
} from "./media";

// Downloads
export type {
  DownloadFailureReason,
  DownloadOutcome,
  DownloadResult,
  DownloadOptions,
} from "./download";

// Context
export type {
  RunContext,
  Issue,
  IssueType,
  DownloadIssue,
  ResourceIssue,
  ResourceIssueReason,
  RunStats,
} from "./context";

// Tracker
export { Tracker } from "../utils/tracker";
