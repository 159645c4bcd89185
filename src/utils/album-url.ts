import { InvalidUrlError } from "../errors";
import type { AlbumReference } from "../types";

const SHORT_HOSTS = new Set(["photos.app.goo.gl"]);
const FULL_HOSTS = new Set(["photos.google.com"]);

const SHORT_PATH = /^\/([A-Za-z0-9]+)\/?$/;
const LEGACY_SHORT_PATH = /^\/photos\/([A-Za-z0-9]+)\/?$/; // goo.gl/photos/<code>
const SHARE_PATH = /^(?:\/u\/\d+)?\/share\/([A-Za-z0-9_-]+)\/?$/;

function freeze(reference: AlbumReference): AlbumReference {
  return Object.freeze(reference);
}

/**
 * Parse a shared album URL into an AlbumReference
 *
 * @example
 * parseAlbumUrl("https://photos.app.goo.gl/AbCdEfGh12345")
 * // => { shareUrl: "https://photos.app.goo.gl/AbCdEfGh12345", albumKey: "AbCdEfGh12345", form: "short" }
 *
 * parseAlbumUrl("https://photos.google.com/share/AF1QipAbc?key=xyz")
 * // => { shareUrl: "...", albumKey: "AF1QipAbc", authKey: "xyz", form: "full" }
 *
 * @throws InvalidUrlError when the input is not a share link
 */
export function parseAlbumUrl(input: string): AlbumReference {
  const trimmed = input.trim();

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw new InvalidUrlError(input);
  }

  if (url.protocol !== "https:" && url.protocol !== "http:") {
    throw new InvalidUrlError(input);
  }
  url.protocol = "https:";

  const host = url.hostname.toLowerCase();

  if (SHORT_HOSTS.has(host)) {
    const match = url.pathname.match(SHORT_PATH);
    if (!match) throw new InvalidUrlError(input);
    return freeze({
      shareUrl: url.toString(),
      albumKey: match[1],
      form: "short",
    });
  }

  if (host === "goo.gl") {
    const match = url.pathname.match(LEGACY_SHORT_PATH);
    if (!match) throw new InvalidUrlError(input);
    return freeze({
      shareUrl: url.toString(),
      albumKey: match[1],
      form: "short",
    });
  }

  if (FULL_HOSTS.has(host)) {
    const match = url.pathname.match(SHARE_PATH);
    if (!match) throw new InvalidUrlError(input);
    const authKey = url.searchParams.get("key") || undefined;
    return freeze({
      shareUrl: url.toString(),
      albumKey: match[1],
      authKey,
      form: "full",
    });
  }

  throw new InvalidUrlError(input);
}

/**
 * Like parseAlbumUrl, but returns null instead of throwing
 */
export function tryParseAlbumUrl(input: string): AlbumReference | null {
  try {
    return parseAlbumUrl(input);
  } catch (error) {
    if (error instanceof InvalidUrlError) return null;
    throw error;
  }
}
