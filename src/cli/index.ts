#!/usr/bin/env node

/**
 * CLI entry point for the shared album downloader
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { downloadCommand } from "./commands/download";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("gphoto-get")
  .description("Download every photo and video of a shared Google Photos album")
  .version("0.1.0");

// Main download command (default action)
program
  .argument("<url>", "Shared album URL")
  .option("-o, --output-dir <path>", "Output directory")
  .option("-j, --concurrency <n>", "Parallel downloads")
  .option("-c, --config <path>", "Path to custom config file")
  .option("--force", "Re-download files that already exist")
  .option("--dry-run", "List the album without downloading")
  .option("-v, --verbose", "Verbose output")
  .action(downloadCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

await program.parseAsync();
