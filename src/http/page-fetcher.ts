/**
 * Page Fetcher
 * Retrieves the shared album page and batch RPC continuation payloads.
 * No retry here: the pagination walker owns retries.
 */

import { assertOk, type HttpClient } from "./client";
import type { Continuation, RawPage } from "../types";

export const PHOTOS_ORIGIN = "https://photos.google.com";
export const LISTING_RPC_ID = "snAcKc";

/**
 * Build the form body for a listing continuation request
 *
 * @example
 * buildContinuationBody({ albumKey: "AF1QipAbc", token: "t1" })
 * // => 'f.req=%5B%5B%5B%22snAcKc%22...&'
 */
export function buildContinuationBody(continuation: Continuation): string {
  const args = JSON.stringify([
    continuation.albumKey,
    continuation.token,
    null,
    continuation.authKey ?? null,
  ]);
  const request = JSON.stringify([[[LISTING_RPC_ID, args, null, "generic"]]]);
  return `f.req=${encodeURIComponent(request)}&`;
}

/**
 * Build the batch RPC endpoint URL for a listing continuation
 */
export function buildContinuationUrl(continuation: Continuation): string {
  const url = new URL("/_/PhotosUi/data/batchexecute", PHOTOS_ORIGIN);
  url.searchParams.set("rpcids", LISTING_RPC_ID);
  url.searchParams.set("source-path", `/share/${continuation.albumKey}`);
  url.searchParams.set("hl", "en");
  url.searchParams.set("rt", "c");
  return url.toString();
}

/**
 * Fetch one page: GET the share URL (following redirects) on the first round,
 * POST the continuation token on later rounds
 *
 * @throws NetworkError on transport failure
 * @throws HttpError on a non-2xx response
 */
export async function fetchPage(
  client: HttpClient,
  url: string,
  continuation?: Continuation,
  signal?: AbortSignal,
): Promise<RawPage> {
  if (!continuation) {
    const response = await client.request(url, {
      method: "GET",
      headers: { accept: "text/html,application/xhtml+xml" },
      signal,
    });
    assertOk(response);
    return { type: "html", url: response.url, body: await response.text() };
  }

  const rpcUrl = buildContinuationUrl(continuation);
  const response = await client.request(rpcUrl, {
    method: "POST",
    headers: {
      "content-type": "application/x-www-form-urlencoded;charset=UTF-8",
      origin: PHOTOS_ORIGIN,
      referer: url,
    },
    body: buildContinuationBody(continuation),
    signal,
  });
  assertOk(response);
  return { type: "rpc", url: response.url, body: await response.text() };
}
