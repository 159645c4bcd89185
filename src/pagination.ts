/**
 * Pagination Walker
 * Drives the page fetcher and manifest parser across continuation tokens
 * until the album is fully enumerated
 */

import { fetchPage } from "./http/page-fetcher";
import { sharedAlbumParser } from "./parsers";
import { tryParseAlbumUrl } from "./utils/album-url";
import { backoffDelay, sleep } from "./utils/sleep";
import {
  CancelledError,
  HttpError,
  PaginationError,
  isTransient,
} from "./errors";
import type { HttpClient } from "./http/client";
import type { Logger } from "./utils/logger";
import type {
  AlbumReference,
  Continuation,
  ManifestParser,
  MediaEntry,
  PaginationConfig,
  PaginationState,
  RawPage,
} from "./types";

export interface PaginationOptions extends PaginationConfig {
  parser?: ManifestParser;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface PageRound {
  round: number;
  added: MediaEntry[]; // Entries not seen in earlier rounds
  total: number;
  nextToken?: string;
}

type AlbumKeys = Omit<Continuation, "token">;

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Fetch one round, retrying transient failures
 *
 * @throws PaginationError when retries run out or the failure is permanent
 */
async function fetchRound(
  client: HttpClient,
  url: string,
  continuation: Continuation | undefined,
  round: number,
  options: PaginationOptions,
): Promise<RawPage> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
    try {
      return await fetchPage(client, url, continuation, options.signal);
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      if (!isTransient(error)) {
        throw new PaginationError(
          `Page ${round} could not be fetched: ${describe(error)}`,
          { cause: error },
        );
      }

      lastError = error;
      if (attempt < options.maxRetries) {
        const retryAfter =
          error instanceof HttpError ? error.retryAfterMs : undefined;
        const delay = backoffDelay(options.retryDelay, attempt, retryAfter);
        options.logger?.debug(
          `Page ${round} attempt ${attempt + 1} failed (${describe(error)}), retrying in ${delay}ms`,
        );
        await sleep(delay, options.signal);
      }
    }
  }

  throw new PaginationError(
    `Page ${round} failed after ${options.maxRetries + 1} attempts: ${describe(lastError)}`,
    { cause: lastError },
  );
}

/**
 * Walk the album one round at a time
 *
 * Terminates when no continuation token remains, or after maxEmptyRounds
 * consecutive rounds that add nothing new. Exceeding maxPages is an error.
 * Returns the final PaginationState when the generator completes.
 */
export async function* paginate(
  client: HttpClient,
  album: AlbumReference,
  options: PaginationOptions,
): AsyncGenerator<PageRound, PaginationState> {
  const parser = options.parser ?? sharedAlbumParser;
  const state: PaginationState = { collectedEntries: [] };
  const seen = new Set<string>();

  let pageUrl = album.shareUrl;
  let keys: AlbumKeys | undefined =
    album.form === "full"
      ? { albumKey: album.albumKey, authKey: album.authKey }
      : undefined;
  let emptyRounds = 0;

  for (let round = 1; ; round++) {
    if (round > options.maxPages) {
      throw new PaginationError(
        `Album still advertised more pages after ${options.maxPages} rounds`,
      );
    }

    let continuation: Continuation | undefined;
    if (state.continuationToken !== undefined) {
      if (!keys) {
        throw new PaginationError(
          `Share link did not resolve to an album URL (${pageUrl})`,
        );
      }
      continuation = { ...keys, token: state.continuationToken };
    }

    const page = await fetchRound(client, pageUrl, continuation, round, options);

    // Short links only reveal the album key after the redirect
    if (round === 1) {
      pageUrl = page.url;
      const resolved = tryParseAlbumUrl(page.url);
      if (resolved?.form === "full") {
        keys = {
          albumKey: resolved.albumKey,
          authKey: resolved.authKey ?? keys?.authKey,
        };
      }
    }

    const { entries, nextToken } = parser.extract(page);

    const added: MediaEntry[] = [];
    for (const entry of entries) {
      if (seen.has(entry.id)) continue;
      seen.add(entry.id);
      added.push(entry);
    }

    state.collectedEntries.push(...added);
    state.continuationToken = nextToken;

    options.logger?.debug(
      `Page ${round}: ${entries.length} entries, ${added.length} new${nextToken ? ", more to come" : ""}`,
    );
    yield { round, added, total: state.collectedEntries.length, nextToken };

    if (nextToken === undefined) break;

    emptyRounds = added.length === 0 ? emptyRounds + 1 : 0;
    if (emptyRounds >= options.maxEmptyRounds) {
      options.logger?.warn(
        `No new entries in ${emptyRounds} consecutive pages, stopping pagination`,
      );
      break;
    }
  }

  return state;
}

/**
 * Enumerate the whole album into a manifest, in discovery order
 */
export async function walk(
  client: HttpClient,
  album: AlbumReference,
  options: PaginationOptions,
): Promise<MediaEntry[]> {
  const entries: MediaEntry[] = [];
  for await (const { added } of paginate(client, album, options)) {
    entries.push(...added);
  }
  return entries;
}
