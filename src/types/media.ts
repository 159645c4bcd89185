/**
 * Album and media type definitions
 */

export type MediaKind = "photo" | "video";

/**
 * A parsed share link
 *
 * Short links (photos.app.goo.gl) carry only a short code as albumKey;
 * the real key and authKey appear once the link has been followed.
 */
export interface AlbumReference {
  readonly shareUrl: string;
  readonly albumKey: string;
  readonly authKey?: string;
  readonly form: "short" | "full";
}

export interface MediaEntry {
  readonly id: string; // Unique within an album
  readonly baseUrl: string; // googleusercontent URL without size suffix
  readonly kind: MediaKind;
  readonly width: number;
  readonly height: number;
}

export interface ResolvedMedia extends MediaEntry {
  readonly downloadUrl: string;
  readonly targetFilename: string; // Unique across the batch
}

/**
 * Raw payload returned by the page fetcher
 * - html: the shared album page (first round)
 * - rpc: a batch RPC response (continuation rounds)
 */
export interface RawPage {
  type: "html" | "rpc";
  url: string; // Final URL after redirects
  body: string;
}

export interface Continuation {
  albumKey: string;
  authKey?: string;
  token: string;
}

export interface PageListing {
  entries: MediaEntry[];
  nextToken?: string;
}

/**
 * Pluggable manifest parser
 * Turns one raw page into its entries and the next continuation token
 */
export interface ManifestParser {
  extract(page: RawPage): PageListing;
}

export interface PaginationState {
  continuationToken?: string;
  collectedEntries: MediaEntry[];
}
