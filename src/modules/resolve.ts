/**
 * Resolve Module
 * Attaches download URLs and target filenames to the manifest
 */

import { resolveAll } from "../url-resolver";
import type { RunContext } from "../types";

/**
 * Reads from context:
 * - entries
 *
 * Writes to context:
 * - resolved
 */
export function resolve(ctx: RunContext): void {
  if (!ctx.entries) {
    throw new Error("Enumerate must run before resolve");
  }

  ctx.resolved = resolveAll(ctx.entries, ctx.config.naming.style);
}
