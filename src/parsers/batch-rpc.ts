import { ManifestParseError } from "../errors";
import { LISTING_RPC_ID } from "../http/page-fetcher";
import { tryParseJson } from "../utils/slice-json-value";
import { parseListing } from "./listing";
import type { ManifestParser, PageListing, RawPage } from "../types";

// Anti-JSON-hijacking guard prepended to batch RPC responses
const XSSI_GUARD = ")]}'";

/**
 * Find the ["wrb.fr", rpcId, payload] envelope in a batch RPC response
 * The response is a sequence of length-prefixed JSON chunks, one per line.
 */
function findEnvelopePayload(body: string, rpcId: string): unknown {
  const text = body.startsWith(XSSI_GUARD)
    ? body.slice(XSSI_GUARD.length)
    : body;

  for (const line of text.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed.startsWith("[")) continue;

    const chunk = tryParseJson(trimmed);
    if (!Array.isArray(chunk)) continue;

    for (const envelope of chunk) {
      if (
        Array.isArray(envelope) &&
        envelope[0] === "wrb.fr" &&
        envelope[1] === rpcId
      ) {
        return envelope[2];
      }
    }
  }

  return undefined;
}

/**
 * Parser for listing continuation responses
 */
export const batchRpcParser: ManifestParser = {
  extract(page: RawPage): PageListing {
    const payload = findEnvelopePayload(page.body, LISTING_RPC_ID);

    if (typeof payload !== "string") {
      throw new ManifestParseError(
        `No ${LISTING_RPC_ID} payload in response (${page.url})`,
      );
    }

    const data = tryParseJson(payload);
    if (data === undefined) {
      throw new ManifestParseError(
        `${LISTING_RPC_ID} payload is not valid JSON (${page.url})`,
      );
    }

    return parseListing(data, page.url);
  },
};
