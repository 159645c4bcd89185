/**
 * Error taxonomy
 *
 * Fatal: InvalidUrlError, ManifestParseError, PaginationError
 * Transient (retried by callers): NetworkError, HttpError
 */

import type { DownloadFailureReason } from "./types";

export class GphotoError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidUrlError extends GphotoError {
  constructor(readonly input: string) {
    super(`Not a shared album URL: ${input}`);
  }
}

export class NetworkError extends GphotoError {
  constructor(
    readonly url: string,
    message: string,
    readonly timedOut = false,
    options?: { cause?: unknown },
  ) {
    super(`${message} (${url})`, options);
  }
}

export class HttpError extends GphotoError {
  constructor(
    readonly url: string,
    readonly status: number,
    statusText: string,
    readonly retryAfterMs?: number,
  ) {
    super(`HTTP ${status}${statusText ? `: ${statusText}` : ""} (${url})`);
  }

  get isServerError(): boolean {
    return this.status >= 500;
  }

  get isRateLimited(): boolean {
    return this.status === 429;
  }
}

export class ManifestParseError extends GphotoError {}

export class PaginationError extends GphotoError {}

export class CancelledError extends GphotoError {
  constructor(url: string) {
    super(`Cancelled (${url})`);
  }
}

/**
 * Network failures, 5xx and 429 are worth another attempt
 */
export function isTransient(error: unknown): boolean {
  if (error instanceof NetworkError) return true;
  if (error instanceof HttpError) {
    return error.isServerError || error.isRateLimited;
  }
  return false;
}

/**
 * Map a per-item download error to a failure reason
 */
export function classifyDownloadError(
  error: unknown,
): DownloadFailureReason {
  if (error instanceof CancelledError) return "cancelled";
  if (error instanceof Error && error.name === "AbortError") return "cancelled";
  if (error instanceof HttpError) {
    return error.status === 404 || error.status === 410
      ? "not-found"
      : "http-error";
  }
  if (error instanceof NetworkError) {
    return error.timedOut ? "timeout" : "network-error";
  }
  return "write-error";
}
