/**
 * Listing payload parser
 * Both the album page data block and the batch RPC response carry the same
 * listing shape: [albumInfo, mediaRecords, nextToken, ...]
 */

import { z } from "zod";
import { ManifestParseError } from "../errors";
import type { MediaEntry, PageListing } from "../types";

// Object member present only on video records
export const VIDEO_METADATA_KEY = "76647426";

const BASE_URL_PATTERN = /^https:\/\/[^/]*googleusercontent\.com\//;

const DimensionSchema = z.number().int().nonnegative();

/**
 * A media record: [id, [baseUrl, width, height, ...], ...]
 */
export const MediaRecordSchema = z.tuple(
  [
    z.string().min(1),
    z.tuple(
      [z.string().regex(BASE_URL_PATTERN), DimensionSchema, DimensionSchema],
      z.unknown(),
    ),
  ],
  z.unknown(),
);

export type MediaRecord = z.infer<typeof MediaRecordSchema>;

function isVideoRecord(record: readonly unknown[]): boolean {
  return record.some(
    (value) =>
      typeof value === "object" &&
      value !== null &&
      !Array.isArray(value) &&
      VIDEO_METADATA_KEY in value,
  );
}

/**
 * Loose structural check used to pick the listing among several data blocks
 */
export function looksLikeListing(data: unknown): data is unknown[] {
  if (!Array.isArray(data) || !Array.isArray(data[1])) return false;
  const records: unknown[] = data[1];
  return records.every(
    (record) => Array.isArray(record) && Array.isArray(record[1]),
  );
}

/**
 * Turn one media record into a MediaEntry
 */
export function toMediaEntry(record: MediaRecord): MediaEntry {
  const [id, [baseUrl, width, height]] = record;
  return Object.freeze({
    id,
    baseUrl,
    kind: isVideoRecord(record) ? "video" : "photo",
    width,
    height,
  } satisfies MediaEntry);
}

/**
 * Parse a listing payload into entries and the next token
 * All-or-nothing: one malformed record fails the whole page
 *
 * @throws ManifestParseError
 */
export function parseListing(data: unknown, source: string): PageListing {
  if (!Array.isArray(data)) {
    throw new ManifestParseError(`Listing payload is not an array (${source})`);
  }

  const rawRecords: unknown = data[1] ?? [];
  const records = z.array(MediaRecordSchema).safeParse(rawRecords);
  if (!records.success) {
    const issue = records.error.issues[0];
    const where = issue ? `at [${issue.path.join(",")}]: ${issue.message}` : "";
    throw new ManifestParseError(
      `Malformed media record ${where} (${source})`,
    );
  }

  const token: unknown = data[2];
  const nextToken =
    typeof token === "string" && token.length > 0 ? token : undefined;

  return {
    entries: records.data.map(toMediaEntry),
    nextToken,
  };
}
