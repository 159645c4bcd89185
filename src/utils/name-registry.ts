/**
 * Name Registry
 * Deterministic, collision-free local filenames for media entries
 */

import type { MediaEntry, MediaKind, NamingStyle } from "../types";

const EXTENSIONS: Record<MediaKind, string> = {
  photo: "jpg",
  video: "mp4",
};

// Media ids share a 6-character prefix (e.g. "AF1Qip")
const ID_PREFIX_LENGTH = 6;
const SHORT_STEM_LENGTH = 8;

function sanitizeStem(value: string): string {
  return value.replace(/[^A-Za-z0-9_-]/g, "_");
}

/**
 * Stem for a media id
 *
 * @example
 * stemFor("AF1QipOlxzhFkvAbCdEf", "short") // "OlxzhFkv"
 * stemFor("AF1QipOlxzhFkvAbCdEf", "full") // "AF1QipOlxzhFkvAbCdEf"
 */
export function stemFor(id: string, style: NamingStyle): string {
  if (style === "short" && id.length > ID_PREFIX_LENGTH) {
    return sanitizeStem(
      id.slice(ID_PREFIX_LENGTH, ID_PREFIX_LENGTH + SHORT_STEM_LENGTH),
    );
  }
  return sanitizeStem(id);
}

export function extensionFor(kind: MediaKind): string {
  return EXTENSIONS[kind];
}

/**
 * Filename for a single entry, derived only from its id and kind
 */
export function nameFor(
  entry: Pick<MediaEntry, "id" | "kind">,
  style: NamingStyle = "short",
): string {
  return `${stemFor(entry.id, style)}.${extensionFor(entry.kind)}`;
}

/**
 * Assigns filenames across a batch
 *
 * assignAll gives every entry whose short name is shared within the batch its
 * full id, so a name depends on the set of ids, not on their order. A file
 * left by an earlier run is only reused under a short name when no other item
 * in the album shares that stem today; an item removed from the album can
 * still leave a short name behind that a newcomer with the same stem reuses.
 */
export class NameRegistry {
  private usedNames = new Set<string>();

  constructor(private style: NamingStyle = "short") {}

  /**
   * Name a whole manifest, in order
   */
  assignAll(entries: readonly Pick<MediaEntry, "id" | "kind">[]): string[] {
    const counts = new Map<string, number>();
    for (const entry of entries) {
      const key = nameFor(entry, this.style).toLowerCase();
      counts.set(key, (counts.get(key) ?? 0) + 1);
    }

    return entries.map((entry) => {
      const key = nameFor(entry, this.style).toLowerCase();
      return this.assign(entry, (counts.get(key) ?? 0) > 1);
    });
  }

  /**
   * Name one entry; falls back to the full id (then a numeric suffix) when
   * the preferred name is taken
   */
  assign(entry: Pick<MediaEntry, "id" | "kind">, preferFull = false): string {
    const candidates = preferFull
      ? [nameFor(entry, "full")]
      : [nameFor(entry, this.style), nameFor(entry, "full")];

    for (const candidate of candidates) {
      if (this.claim(candidate)) return candidate;
    }

    const stem = stemFor(entry.id, "full");
    const extension = extensionFor(entry.kind);
    for (let n = 1; ; n++) {
      const candidate = `${stem}-${n}.${extension}`;
      if (this.claim(candidate)) return candidate;
    }
  }

  /**
   * Register an existing name to prevent collisions
   */
  register(name: string): void {
    // Case-insensitive filesystems treat "a.jpg" and "A.jpg" as one file
    this.usedNames.add(name.toLowerCase());
  }

  has(name: string): boolean {
    return this.usedNames.has(name.toLowerCase());
  }

  private claim(name: string): boolean {
    if (this.has(name)) return false;
    this.register(name);
    return true;
  }
}
