/**
 * Fragment manifest parsing.
 */
import { ResolutionParseError } from "../shared/errors.js";
import { type HttpTransport, responseText } from "../shared/transport.js";
import { stripManifestName } from "../shared/url.js";

// ============================================================================
// Types
// ============================================================================

export interface Fragment {
  index: number;
  url: string;
  /** Declared duration in seconds */
  duration: number;
  /** Sum of the declared durations of all previous fragments */
  start: number;
}

export interface FragmentCatalog {
  manifestUrl: string;
  /** Manifest URL cut before its "Manifest" name */
  baseUrl: string;
  fragments: readonly Fragment[];
  /** Sum of all fragment durations */
  fullDuration: number;
  /** fullDuration clamped by the time limit */
  totalDuration: number;
}

const FRAGMENT_PREFIX = "Fragments";
const DURATION_PREFIX = "#EXTINF:";

// ============================================================================
// Parsing
// ============================================================================

/**
 * Reads the duration from an `#EXTINF:<seconds>,<title>` line.
 */
export function parseDurationLine(line: string): number {
  const value = line.substring(DURATION_PREFIX.length).split(",", 1)[0]?.trim() ?? "";
  const seconds = Number(value);
  if (value === "" || !Number.isFinite(seconds) || seconds < 0) {
    throw new ResolutionParseError(`Invalid fragment duration: ${line}`);
  }
  return seconds;
}

/**
 * Parses a terminal manifest into its ordered fragments.
 *
 * @param timeLimit - Seconds to keep; 0 keeps everything
 *
 * @example
 * parseFragmentCatalog("#EXTINF:2.0,\nFragments(video=0)\n", url).totalDuration
 * // => 2
 */
export function parseFragmentCatalog(
  text: string,
  manifestUrl: string,
  timeLimit = 0
): FragmentCatalog {
  const lines = text.replace(/\r/g, "").split("\n");
  const baseUrl = stripManifestName(manifestUrl);

  const urls = lines
    .filter((line) => line.startsWith(FRAGMENT_PREFIX))
    .map((line) => baseUrl + line);
  const durations = lines.filter((line) => line.startsWith(DURATION_PREFIX)).map(parseDurationLine);

  if (urls.length === 0) {
    throw new ResolutionParseError(`No fragments found in manifest ${manifestUrl}`);
  }
  if (urls.length !== durations.length) {
    throw new ResolutionParseError(
      `Manifest ${manifestUrl} lists ${urls.length} fragments but ${durations.length} durations`
    );
  }

  const fragments: Fragment[] = [];
  let start = 0;
  for (const [index, url] of urls.entries()) {
    const duration = durations[index] ?? 0;
    fragments.push({ index, url, duration, start });
    start += duration;
  }

  return {
    manifestUrl,
    baseUrl,
    fragments,
    fullDuration: start,
    totalDuration: timeLimit > 0 ? Math.min(start, timeLimit) : start,
  };
}

/**
 * Downloads and parses a terminal manifest.
 */
export async function fetchFragmentCatalog(
  manifestUrl: string,
  transport: HttpTransport,
  timeLimit = 0
): Promise<FragmentCatalog> {
  const response = await transport.fetch(manifestUrl);
  return parseFragmentCatalog(responseText(response), manifestUrl, timeLimit);
}
