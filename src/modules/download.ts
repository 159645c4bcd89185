/**
 * Download Module
 * Fetches every resolved item into the output directory
 */

import { downloadAll } from "../download-manager";
import type { DownloadResult, RunContext } from "../types";

function describe({ entry, outcome }: DownloadResult): string {
  switch (outcome.status) {
    case "success":
      return `Downloaded ${entry.targetFilename} (${outcome.bytes} bytes)`;
    case "skipped":
      return `Skipping ${entry.targetFilename} (exists)`;
    case "failed":
      return `Failed ${entry.id}: ${outcome.error}`;
  }
}

/**
 * Reads from context:
 * - resolved
 *
 * Writes to context:
 * - results
 */
export async function download(ctx: RunContext): Promise<void> {
  if (!ctx.resolved) {
    throw new Error("Resolve must run before download");
  }

  const { client, config, tracker, logger, signal } = ctx;
  const total = ctx.resolved.length;
  let settled = 0;

  ctx.results = await downloadAll(
    client,
    ctx.resolved,
    config.output.directory,
    {
      ...config.download,
      overwrite: config.output.overwrite,
      signal,
      onResult: (result) => {
        settled++;
        tracker.trackResult(result);
        logger.debug(describe(result));
        ctx.onProgress?.(`Downloading... ${settled}/${total}`);
      },
    },
  );
}
