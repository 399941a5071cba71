#!/usr/bin/env node

import { Command } from "commander";
import chalk from "chalk";
import { configGetCommand, configSetCommand, configShowCommand } from "./commands/config.js";
import {
  downloadCommand,
  parsePositiveInt,
  parseSeconds,
  parseWholeSeconds,
  type DownloadOptions,
} from "./commands/download.js";

// Global error handler to ensure clean exit
process.on("unhandledRejection", (reason) => {
  console.error(chalk.red("\n❌ Unhandled error"));
  if (reason instanceof Error) {
    console.error(chalk.gray(`   ${reason.message}`));
  }
  process.exit(1);
});

// Helper to wrap async actions and handle errors
function wrapAction<T extends unknown[]>(fn: (...args: T) => Promise<void>): (...args: T) => void {
  return (...args: T) => {
    fn(...args).catch((error: unknown) => {
      console.error(chalk.red("\n❌ Command failed"));
      if (error instanceof Error) {
        console.error(chalk.gray(`   ${error.message}`));
      }
      process.exit(1);
    });
  };
}

const program = new Command();

program
  .name("reelstitch")
  .description("Download LinkedIn feed videos from their adaptive-stream fragments")
  .version("0.1.0");

// Download command (default)
program
  .command("download <url> <file>", { isDefault: true })
  .description("Download a video from a post, quality manifest or fragment manifest URL")
  .option("-m, --max-attempts <n>", "Attempts per request on connection errors", parsePositiveInt)
  .option("-w, --wait <seconds>", "Seconds to wait between attempts", parseWholeSeconds)
  .option("-l, --limit <seconds>", "Only download the first N seconds (0 = everything)", parseSeconds)
  .option("-q, --quality <bitrate>", "Quality level bitrate to download", parsePositiveInt)
  .action(
    wrapAction((url: string, file: string, options: DownloadOptions) =>
      downloadCommand(url, file, options)
    )
  );

// Config commands
const configCmd = program.command("config").description("Manage configuration");

configCmd.command("show").description("Show all configuration values").action(configShowCommand);

configCmd.command("get <key>").description("Get a configuration value").action(configGetCommand);

configCmd
  .command("set <key> <value>")
  .description("Set a configuration value")
  .action(configSetCommand);

// Parse and run
program.parse();
