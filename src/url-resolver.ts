/**
 * URL Resolver
 * Turns base URLs into full-resolution download URLs
 */

import { NameRegistry, nameFor } from "./utils/name-registry";
import type { MediaEntry, NamingStyle, ResolvedMedia } from "./types";

// Original video file; a size suffix would only return a still frame
export const VIDEO_DOWNLOAD_SUFFIX = "=dv";
// Largest available rendition when dimensions are unknown
export const PHOTO_MAX_SUFFIX = "=s0";

/**
 * Drop any "=..." size/crop suffix already present on a base URL
 *
 * @example
 * stripSizeSuffix("https://lh3.googleusercontent.com/pw/AbC=w200-h100") // "https://lh3.googleusercontent.com/pw/AbC"
 */
export function stripSizeSuffix(url: string): string {
  const index = url.lastIndexOf("=");
  if (index === -1 || url.indexOf("/", index) !== -1) return url;
  return url.slice(0, index);
}

/**
 * Full-resolution download URL for an entry, branching on kind
 */
export function downloadUrlFor(entry: MediaEntry): string {
  const base = stripSizeSuffix(entry.baseUrl);

  if (entry.kind === "video") {
    return `${base}${VIDEO_DOWNLOAD_SUFFIX}`;
  }

  if (entry.width > 0 && entry.height > 0) {
    return `${base}=w${entry.width}-h${entry.height}`;
  }
  return `${base}${PHOTO_MAX_SUFFIX}`;
}

/**
 * Resolve a single entry; pure and deterministic
 */
export function resolve(
  entry: MediaEntry,
  style: NamingStyle = "short",
): ResolvedMedia {
  return Object.freeze({
    ...entry,
    downloadUrl: downloadUrlFor(entry),
    targetFilename: nameFor(entry, style),
  });
}

/**
 * Resolve a manifest, keeping filenames unique across the batch
 * Entries sharing a short stem all get their full id as filename.
 */
export function resolveAll(
  entries: readonly MediaEntry[],
  style: NamingStyle = "short",
): ResolvedMedia[] {
  const names = new NameRegistry(style).assignAll(entries);

  return entries.map((entry, index) =>
    Object.freeze({
      ...entry,
      downloadUrl: downloadUrlFor(entry),
      targetFilename: names[index],
    }),
  );
}
