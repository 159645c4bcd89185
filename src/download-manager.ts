/**
 * Download Manager
 * Bounded-concurrency downloads with retry, skip-on-exists and atomic rename
 */

import { createWriteStream } from "node:fs";
import { mkdir, rename, rm, stat } from "fs/promises";
import { join } from "node:path";
import { pipeline } from "node:stream/promises";
import pLimit from "p-limit";
import { assertOk, type HttpClient } from "./http/client";
import { fileSize } from "./utils/file-exists";
import { backoffDelay, sleep } from "./utils/sleep";
import {
  CancelledError,
  HttpError,
  classifyDownloadError,
  isTransient,
} from "./errors";
import type { DownloadOptions, DownloadResult, ResolvedMedia } from "./types";

/**
 * Temporary name for an in-flight download
 * Unique per item because target filenames are unique per batch
 */
export function partFilename(targetFilename: string): string {
  return `.${targetFilename}.part`;
}

function failed(
  entry: ResolvedMedia,
  error: unknown,
  attempts: number,
): DownloadResult {
  return {
    entry,
    outcome: {
      status: "failed",
      reason: classifyDownloadError(error),
      error: error instanceof Error ? error.message : String(error),
      attempts,
    },
  };
}

/**
 * Stream one URL into partPath, then rename it to finalPath
 * The part file is removed on any failure.
 *
 * @returns Number of bytes written
 */
async function fetchToFile(
  client: HttpClient,
  url: string,
  partPath: string,
  finalPath: string,
  signal?: AbortSignal,
): Promise<number> {
  try {
    const response = await client.request(url, { signal });
    try {
      assertOk(response);
    } catch (error) {
      response.stream().destroy();
      throw error;
    }

    await pipeline(response.stream(), createWriteStream(partPath), { signal });
    const { size } = await stat(partPath);
    await rename(partPath, finalPath);
    return size;
  } catch (error) {
    await rm(partPath, { force: true });
    throw error;
  }
}

/**
 * Download a single item with retry and skip-on-exists
 */
export async function downloadOne(
  client: HttpClient,
  entry: ResolvedMedia,
  destinationDir: string,
  options: Omit<DownloadOptions, "concurrency" | "onResult">,
): Promise<DownloadResult> {
  const { signal } = options;
  if (signal?.aborted) {
    return failed(entry, new CancelledError(entry.downloadUrl), 0);
  }

  const finalPath = join(destinationDir, entry.targetFilename);
  if (!options.overwrite) {
    const size = await fileSize(finalPath);
    if (size !== null && size > 0) {
      return { entry, outcome: { status: "skipped" } };
    }
  }

  const partPath = join(destinationDir, partFilename(entry.targetFilename));

  for (let attempt = 0; ; attempt++) {
    try {
      const bytes = await fetchToFile(
        client,
        entry.downloadUrl,
        partPath,
        finalPath,
        signal,
      );
      return {
        entry,
        outcome: { status: "success", bytes, attempts: attempt + 1 },
      };
    } catch (error) {
      const retryable =
        isTransient(error) && attempt < options.retries && !signal?.aborted;
      if (!retryable) {
        return failed(entry, error, attempt + 1);
      }

      const retryAfter =
        error instanceof HttpError ? error.retryAfterMs : undefined;
      await sleep(
        backoffDelay(options.retryDelay, attempt, retryAfter),
        signal,
      );
    }
  }
}

/**
 * Download every item into destinationDir
 *
 * At most `concurrency` downloads run at once. One item's failure never
 * aborts the others. Results come back in input order; onResult fires in
 * completion order.
 */
export async function downloadAll(
  client: HttpClient,
  items: readonly ResolvedMedia[],
  destinationDir: string,
  options: DownloadOptions,
): Promise<DownloadResult[]> {
  await mkdir(destinationDir, { recursive: true });

  const limit = pLimit(Math.max(1, options.concurrency));

  return Promise.all(
    items.map((entry) =>
      limit(async () => {
        const result = await downloadOne(client, entry, destinationDir, options);
        options.onResult?.(result);
        return result;
      }),
    ),
  );
}
