/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const OutputConfigSchema = z.object({
  directory: z.string(),
  overwrite: z.boolean(),
});

export const HttpConfigSchema = z.object({
  userAgent: z.string(),
  acceptLanguage: z.string(),
  timeout: z.number().int().positive(), // In milliseconds
});

export const PaginationConfigSchema = z.object({
  maxRetries: z.number().int().nonnegative(),
  retryDelay: z.number().int().nonnegative(), // Base backoff in milliseconds
  // Stop after this many consecutive rounds that add nothing new
  maxEmptyRounds: z.number().int().positive(),
  // Hard cap on fetch rounds, exceeding it is a pagination error
  maxPages: z.number().int().positive(),
});

export const DownloadConfigSchema = z.object({
  concurrency: z.number().int().positive(),
  retries: z.number().int().nonnegative(),
  retryDelay: z.number().int().nonnegative(), // Base backoff in milliseconds
});

export const NamingConfigSchema = z.object({
  // "short": 8-character stem, "full": the whole media id
  style: z.enum(["short", "full"]),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const AppConfigSchema = z.object({
  output: OutputConfigSchema,
  http: HttpConfigSchema,
  pagination: PaginationConfigSchema,
  download: DownloadConfigSchema,
  naming: NamingConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialAppConfigSchema = AppConfigSchema.partial().extend({
  output: OutputConfigSchema.partial().optional(),
  http: HttpConfigSchema.partial().optional(),
  pagination: PaginationConfigSchema.partial().optional(),
  download: DownloadConfigSchema.partial().optional(),
  naming: NamingConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type HttpConfig = z.infer<typeof HttpConfigSchema>;
export type PaginationConfig = z.infer<typeof PaginationConfigSchema>;
export type DownloadConfig = z.infer<typeof DownloadConfigSchema>;
export type NamingConfig = z.infer<typeof NamingConfigSchema>;
export type NamingStyle = NamingConfig["style"];
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type AppConfig = z.infer<typeof AppConfigSchema>;
export type PartialAppConfig = z.infer<typeof PartialAppConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}
