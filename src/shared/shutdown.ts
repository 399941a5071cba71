/**
 * Graceful shutdown management for CLI commands.
 * Runs registered cleanup (temporary files, open handles) on SIGINT/SIGTERM.
 */
import chalk from "chalk";
import { errorMessage } from "./errors.js";

const SIGNAL_EXIT_CODES: Record<string, number> = {
  SIGINT: 130,
  SIGTERM: 143,
};

/**
 * Shutdown manager instance returned by createShutdownManager.
 */
export interface ShutdownManager {
  /** Set up SIGINT and SIGTERM handlers. Call once at command start. */
  setup: () => void;
  /** Returns false once shutdown has been requested. Polled per frame. */
  shouldContinue: () => boolean;
  /** Register a cleanup callback; callbacks run in registration order. */
  registerCleanup: (fn: () => void | Promise<void>) => void;
}

/**
 * Creates a shutdown manager for graceful CLI termination.
 *
 * @example
 * ```typescript
 * const shutdown = createShutdownManager();
 * shutdown.setup();
 * await downloadStream({
 *   ...options,
 *   registerCleanup: shutdown.registerCleanup,
 *   shouldContinue: shutdown.shouldContinue,
 * });
 * ```
 */
export function createShutdownManager(): ShutdownManager {
  let shuttingDown = false;
  let onCleanup: (() => Promise<void>) | undefined;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      // Force exit on second signal
      console.log(chalk.red("\n\n⚠️  Force exit"));
      process.exit(1);
    }

    shuttingDown = true;
    console.log(chalk.yellow(`\n\n⏹️  ${signal} received, cleaning up...`));

    let exitCode = SIGNAL_EXIT_CODES[signal] ?? 1;
    try {
      await onCleanup?.();
      console.log(chalk.gray("   Temporary files removed."));
    } catch (error) {
      console.error(chalk.red(`   Cleanup failed: ${errorMessage(error)}`));
      exitCode = 1;
    }

    process.exit(exitCode);
  };

  return {
    setup: () => {
      process.on("SIGINT", () => void shutdown("SIGINT"));
      process.on("SIGTERM", () => void shutdown("SIGTERM"));
    },

    shouldContinue: () => !shuttingDown,

    registerCleanup: (fn: () => void | Promise<void>) => {
      const previousCleanup = onCleanup;
      onCleanup = async () => {
        if (previousCleanup) {
          await previousCleanup();
        }
        await fn();
      };
    },
  };
}
