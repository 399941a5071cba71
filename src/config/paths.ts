import { homedir } from "node:os";
import { join } from "node:path";
import untildify from "untildify";

/**
 * Application directory paths.
 * Uses ~/.reelstitch/ for easy access and visibility.
 */
export const APP_DIR = join(homedir(), ".reelstitch");
export const CONFIG_FILE = join(APP_DIR, "config.json");

/**
 * Prefix for per-run temporary work directories.
 */
export const WORK_DIR_PREFIX = "reelstitch-";

/**
 * Expand ~ to home directory in paths.
 */
export function expandPath(path: string): string {
  return untildify(path);
}
