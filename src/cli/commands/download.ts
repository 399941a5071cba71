import chalk from "chalk";
import cliProgress from "cli-progress";
import { InvalidArgumentError } from "commander";
import ora from "ora";
import { loadConfig } from "../../config/configManager.js";
import { expandPath } from "../../config/paths.js";
import { toRetryPolicy, type Config, type RetryPolicy } from "../../config/schema.js";
import { downloadStream, type DownloadProgress } from "../../downloader/index.js";
import { createShutdownManager } from "../../shared/shutdown.js";
import { RetryingTransport } from "../../shared/transport.js";

export interface DownloadOptions {
  maxAttempts?: number;
  wait?: number;
  limit?: number;
  quality?: number;
}

export interface DownloadSettings {
  policy: RetryPolicy;
  timeLimit: number;
  quality: number;
}

/**
 * Commander argument parser for positive integers.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

/**
 * Commander argument parser for whole seconds, as stored in the config.
 */
export function parseWholeSeconds(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative whole number of seconds.");
  }
  return parsed;
}

/**
 * Commander argument parser for a non-negative number of seconds.
 */
export function parseSeconds(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative number of seconds.");
  }
  return parsed;
}

/**
 * Merges command line flags over the stored configuration.
 */
export function resolveDownloadSettings(options: DownloadOptions, config: Config): DownloadSettings {
  return {
    policy: toRetryPolicy({
      maxAttempts: options.maxAttempts ?? config.maxAttempts,
      waitSeconds: options.wait ?? config.waitSeconds,
    }),
    timeLimit: options.limit ?? config.timeLimitSeconds,
    quality: options.quality ?? config.quality,
  };
}

/**
 * Downloads one stream into a local MP4 file.
 */
export async function downloadCommand(
  url: string,
  file: string,
  options: DownloadOptions
): Promise<void> {
  const settings = resolveDownloadSettings(options, loadConfig());
  const outputPath = expandPath(file);

  const shutdown = createShutdownManager();
  shutdown.setup();

  console.log(chalk.blue("\n🎬 Downloading stream\n"));
  console.log(chalk.gray(`   Source: ${url}`));
  console.log(chalk.gray(`   Output: ${outputPath}`));
  console.log(chalk.gray(`   Quality: ${settings.quality}`));
  if (settings.timeLimit > 0) {
    console.log(chalk.gray(`   Limit: ${settings.timeLimit}s`));
  }
  console.log();

  const spinner = ora("Resolving manifest...").start();
  let progressBar: cliProgress.SingleBar | undefined;

  const onProgress = (progress: DownloadProgress): void => {
    if (progress.phase !== "rendering" || progress.totalFrames === undefined) {
      return;
    }
    if (!progressBar) {
      spinner.succeed("Manifest resolved");
      progressBar = new cliProgress.SingleBar(
        {
          format: "   {bar} {percentage}% | {value}/{total} frames | {status}",
          barCompleteChar: "█",
          barIncompleteChar: "░",
          barsize: 30,
          hideCursor: true,
        },
        cliProgress.Presets.shades_grey
      );
      progressBar.start(progress.totalFrames, 0, { status: "Starting..." });
    }
    progressBar.update(progress.renderedFrames ?? 0, {
      status: `fragment ${progress.downloadedFragments ?? 0}/${progress.totalFragments ?? 0}`,
    });
  };

  try {
    const result = await downloadStream({
      url,
      outputPath,
      quality: settings.quality,
      timeLimit: settings.timeLimit,
      transport: new RetryingTransport(settings.policy),
      onProgress,
      onStatus: (message) => {
        if (progressBar) {
          return;
        }
        spinner.text = message;
      },
      registerCleanup: shutdown.registerCleanup,
      shouldContinue: shutdown.shouldContinue,
    });
    progressBar?.stop();

    if (!result.success) {
      spinner.stop();
      if (result.errorCode === "QUALITY_UNAVAILABLE") {
        console.error(`Argument -q QUALITY error: ${result.error ?? ""}`);
      } else {
        console.error(chalk.red(`\n❌ ${result.error ?? "Download failed"}\n`));
      }
      process.exit(1);
    }

    if (spinner.isSpinning) {
      spinner.succeed("Manifest resolved");
    }
    const duration = result.duration !== undefined ? ` (${result.duration.toFixed(1)}s)` : "";
    console.log(chalk.green(`\n✅ Saved ${result.outputPath ?? outputPath}${duration}\n`));
  } catch (error) {
    progressBar?.stop();
    if (spinner.isSpinning) {
      spinner.fail("Download failed");
    }
    throw error;
  }
}
