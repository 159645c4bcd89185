/**
 * Download command - Loads config and runs the download pipeline
 */

import ora from "ora";
import { z } from "zod";
import { GphotoError } from "../../errors";
import { createHttpClient, type HttpClient } from "../../http/client";
import { loadConfig, parseAlbumUrl, Logger, Tracker } from "../../utils";
import * as modules from "../../modules";
import type { RunContext } from "../../types";

const DownloadOptionsSchema = z.object({
  outputDir: z.string().optional(),
  concurrency: z.coerce.number().int().positive().optional(),
  config: z.string().optional(),
  force: z.boolean().optional(),
  dryRun: z.boolean().optional(),
  verbose: z.boolean().optional(),
});

type Options = z.input<typeof DownloadOptionsSchema>;

export async function downloadCommand(
  url: string,
  opts: Options,
): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();

  // First Ctrl+C stops new downloads; in-flight ones are aborted cleanly
  const controller = new AbortController();
  const onInterrupt = () => {
    spinner.text = "Cancelling...";
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  let client: HttpClient | undefined;

  try {
    // Validate CLI options
    const options = DownloadOptionsSchema.parse(opts);
    const album = parseAlbumUrl(url);

    // Load configuration (default → user → custom)
    const { config, errors } = await loadConfig(options.config);

    // Override with CLI options
    if (options.outputDir) {
      config.output.directory = options.outputDir;
    }
    if (options.concurrency) {
      config.download.concurrency = options.concurrency;
    }
    if (options.force) {
      config.output.overwrite = true;
    }

    const tracker = new Tracker();
    const logger = new Logger(options.verbose ? "debug" : config.logging.level);

    // Add any config loading errors to tracker
    for (const err of errors) {
      tracker.trackResourceError(err.path, err.error);
      logger.warn(`Ignoring config file ${err.path}`);
    }

    client = createHttpClient(config.http);

    const ctx: RunContext = {
      config,
      album,
      client,
      tracker,
      logger,
      signal: controller.signal,
      onProgress: (message) => {
        spinner.text = message;
      },
    };

    spinner.text = "Fetching album metadata...";
    await modules.enumerate(ctx);
    modules.resolve(ctx);

    if (options.dryRun) {
      spinner.stop();
      modules.list(ctx);
      return;
    }

    spinner.text = "Downloading...";
    await modules.download(ctx);

    // Clear and stop spinner before displaying stats
    spinner.clear();
    spinner.stop();

    modules.stats(ctx);

    if (tracker.hasFailures()) {
      process.exitCode = 1;
    }
  } catch (error) {
    if (error instanceof GphotoError) {
      spinner.fail(error.message);
    } else {
      spinner.fail("Download failed");
      console.error(error);
    }
    process.exitCode = 1;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
    await client?.close();
  }
}
