import * as cheerio from "cheerio";
import { ManifestParseError } from "../errors";
import { sliceJsonValue, tryParseJson } from "../utils/slice-json-value";
import { looksLikeListing, parseListing } from "./listing";
import type { ManifestParser, PageListing, RawPage } from "../types";

export const DATA_CALLBACK_MARKER = "AF_initDataCallback(";
const DATA_FIELD = /\bdata\s*:\s*/g;

/**
 * Collect the `data:` arrays of every AF_initDataCallback block in a script
 *
 * @throws ManifestParseError when a block's data cannot be cut out or parsed
 */
function collectDataBlocks(script: string, source: string): unknown[] {
  const blocks: unknown[] = [];
  let from = script.indexOf(DATA_CALLBACK_MARKER);

  while (from !== -1) {
    DATA_FIELD.lastIndex = from + DATA_CALLBACK_MARKER.length;
    const field = DATA_FIELD.exec(script);
    if (!field) {
      throw new ManifestParseError(
        `Data block without a data field (${source})`,
      );
    }

    const start = field.index + field[0].length;
    const json = sliceJsonValue(script, start);
    if (json === null) {
      throw new ManifestParseError(`Unterminated data block (${source})`);
    }

    const data = tryParseJson(json);
    if (data === undefined) {
      throw new ManifestParseError(`Data block is not valid JSON (${source})`);
    }

    blocks.push(data);
    from = script.indexOf(DATA_CALLBACK_MARKER, start + json.length);
  }

  return blocks;
}

/**
 * Parser for the shared album HTML page
 * The listing lives in one of the AF_initDataCallback script blocks
 */
export const albumPageParser: ManifestParser = {
  extract(page: RawPage): PageListing {
    const $ = cheerio.load(page.body);
    const blocks: unknown[] = [];

    $("script").each((_, element) => {
      const script = $(element).html() ?? "";
      if (script.includes(DATA_CALLBACK_MARKER)) {
        blocks.push(...collectDataBlocks(script, page.url));
      }
    });

    if (blocks.length === 0) {
      throw new ManifestParseError(
        `No ${DATA_CALLBACK_MARKER.slice(0, -1)} block found (${page.url})`,
      );
    }

    // Prefer a non-empty listing; an empty one means an empty album
    const listings = blocks.filter(looksLikeListing);
    const listing =
      listings.find((data) => Array.isArray(data[1]) && data[1].length > 0) ??
      listings[0];

    if (!listing) {
      throw new ManifestParseError(`No media listing in page (${page.url})`);
    }

    return parseListing(listing, page.url);
  },
};
