#!/usr/bin/env node

/**
 * CLI entry point for the subreddit image downloader
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { downloadCommand } from "./commands/download";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("reddit-image-dl")
  .description("Download images linked from a subreddit")
  .version("0.1.0");

// Download command (default)
program
  .command("download <subreddit> <destdir>", { isDefault: true })
  .description("Download images from a subreddit into a directory")
  .option("--last <id>", "ID of the last downloaded item", "")
  .option("--score <n>", "Minimum score of images to download", "0")
  .option("--num <n>", "Number of images to download (0 = unlimited)", "0")
  .option("--update", "Run until a file already downloaded is found")
  .option("--sfw", "Download safe for work images only")
  .option("--nsfw", "Download NSFW images only")
  .option("--regex <pattern>", "Title must match this pattern from the start")
  .option("--timeout <ms>", "Request timeout in milliseconds")
  .option("-c, --config <path>", "Path to custom config file")
  .option("-v, --verbose", "Verbose output")
  .action(downloadCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

program.parse();
