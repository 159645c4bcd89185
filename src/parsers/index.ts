/**
 * Manifest parsers
 */

import { albumPageParser } from "./album-page";
import { batchRpcParser } from "./batch-rpc";
import type { ManifestParser, RawPage } from "../types";

// Export individual parsers
export { albumPageParser, batchRpcParser };
export { parseListing, VIDEO_METADATA_KEY } from "./listing";

// Parser registry by payload type
const parsers: Record<RawPage["type"], ManifestParser> = {
  html: albumPageParser,
  rpc: batchRpcParser,
};

/**
 * Get the appropriate parser for a payload type
 */
export function getParser(type: RawPage["type"]): ManifestParser {
  return parsers[type];
}

/**
 * Default strategy: dispatches on the payload type
 */
export const sharedAlbumParser: ManifestParser = {
  extract(page) {
    return getParser(page.type).extract(page);
  },
};
