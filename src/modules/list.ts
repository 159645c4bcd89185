/**
 * List Module
 * Prints the resolved manifest without downloading (--dry-run)
 */

import chalk from "chalk";
import type { RunContext } from "../types";

export function list(ctx: RunContext): void {
  if (!ctx.resolved) {
    throw new Error("Resolve must run before list");
  }

  const items = ctx.resolved;
  console.log("");
  console.log(
    `  ${chalk.bold(`${items.length} items`)} ${chalk.dim("in discovery order")}`,
  );

  for (const [index, item] of items.entries()) {
    const position = chalk.dim(String(index + 1).padStart(4));
    const kind =
      item.kind === "video" ? chalk.magenta("video") : chalk.cyan("photo");
    const size = chalk.dim(`${item.width}x${item.height}`);
    console.log(
      `  ${position} ${kind} ${item.targetFilename.padEnd(24)} ${size}`,
    );
    console.log(`       ${chalk.dim(item.downloadUrl)}`);
  }

  console.log("");
}
