/**
 * Enumerate Module
 * Walks every page of the album and builds the manifest
 */

import { paginate } from "../pagination";
import type { MediaEntry, RunContext } from "../types";

/**
 * Writes to context:
 * - entries: deduplicated manifest in discovery order
 */
export async function enumerate(ctx: RunContext): Promise<void> {
  const { client, album, config, logger, signal } = ctx;
  const entries: MediaEntry[] = [];

  logger.debug(`Resolving ${album.shareUrl}`);

  const rounds = paginate(client, album, {
    ...config.pagination,
    signal,
    logger,
  });

  for await (const round of rounds) {
    entries.push(...round.added);
    ctx.onProgress?.(
      `Fetching album metadata... ${round.total} items (page ${round.round})`,
    );
  }

  logger.debug(`Found ${entries.length} items in album`);

  ctx.entries = entries;
  ctx.tracker.setTotalItems(entries.length);
}
