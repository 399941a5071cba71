/**
 * Resolves a post, master playlist or manifest URL to the fragment manifest
 * of one quality level.
 */
import { formatQualityMessage, ResolutionParseError } from "../shared/errors.js";
import { type HttpTransport, responseText } from "../shared/transport.js";
import { replaceLastSegment } from "../shared/url.js";
import { extractMasterPlaylistUrl } from "./schemas.js";
import { extractSessionContext, sessionRequestOptions, videoApiUrl } from "./session.js";

// ============================================================================
// Types
// ============================================================================

/**
 * What a URL points at, judged by its shape.
 */
export type StreamUrl =
  | { kind: "terminal"; url: string }
  | { kind: "quality-select"; url: string }
  | { kind: "landing-page"; url: string };

export interface QualityLevel {
  bitrate: number;
  /** The manifest line, relative to the quality manifest's directory */
  line: string;
}

export type QualitySelection =
  | { success: true; manifestUrl: string }
  | { success: false; availableQualities: number[] };

export type ManifestResolution =
  | { success: true; manifestUrl: string; hops: number }
  | {
      success: false;
      error: string;
      errorCode: "QUALITY_UNAVAILABLE";
      availableQualities: number[];
    };

export interface ResolveOptions {
  /** Upper bound on URL rewrites before giving up */
  maxHops?: number | undefined;
}

export const DEFAULT_MAX_HOPS = 8;

// ============================================================================
// Classification
// ============================================================================

export function classifyStreamUrl(url: string): StreamUrl {
  if (url.includes("/Manifest")) {
    return { kind: "terminal", url };
  }
  if (url.includes("/manifest")) {
    return { kind: "quality-select", url };
  }
  return { kind: "landing-page", url };
}

// ============================================================================
// Quality Selection
// ============================================================================

/**
 * Lists the `QualityLevels(<bitrate>)` lines of a quality manifest in order.
 */
export function parseQualityLevels(text: string): QualityLevel[] {
  const levels: QualityLevel[] = [];
  for (const line of text.replace(/\r/g, "").split("\n")) {
    const match = /^QualityLevels\((\d+)\)/.exec(line);
    if (match?.[1]) {
      levels.push({ bitrate: parseInt(match[1], 10), line });
    }
  }
  return levels;
}

/**
 * Picks the fragment manifest for `quality`. The first
 * `QualityLevels(<quality>)/Manifest` line wins and replaces the last
 * segment of the quality manifest URL.
 */
export function selectQuality(text: string, manifestUrl: string, quality: number): QualitySelection {
  const levels = parseQualityLevels(text);
  const prefix = `QualityLevels(${quality})/Manifest`;

  const match = levels.find((level) => level.line.startsWith(prefix));
  if (match) {
    return { success: true, manifestUrl: replaceLastSegment(manifestUrl, match.line) };
  }

  return {
    success: false,
    availableQualities: levels.map((level) => level.bitrate).sort((a, b) => a - b),
  };
}

// ============================================================================
// Landing Page
// ============================================================================

/**
 * Walks landing page → session → video API and returns the first master
 * playlist URL.
 */
export async function resolveLandingPage(url: string, transport: HttpTransport): Promise<string> {
  const page = await transport.fetch(url);
  const session = extractSessionContext(page);

  const api = await transport.fetch(videoApiUrl(session.contentId), sessionRequestOptions(session));
  return extractMasterPlaylistUrl(responseText(api));
}

// ============================================================================
// Resolution
// ============================================================================

/**
 * Follows `url` until it names a fragment manifest of the requested quality.
 * An unavailable quality is returned as a failed result; anything else that
 * goes wrong is thrown.
 */
export async function resolveManifestUrl(
  url: string,
  quality: number,
  transport: HttpTransport,
  options: ResolveOptions = {}
): Promise<ManifestResolution> {
  const maxHops = options.maxHops ?? DEFAULT_MAX_HOPS;
  let current = url;

  for (let hops = 0; hops < maxHops; hops++) {
    const step = classifyStreamUrl(current);

    switch (step.kind) {
      case "terminal":
        return { success: true, manifestUrl: step.url, hops };

      case "quality-select": {
        const response = await transport.fetch(step.url);
        const selection = selectQuality(responseText(response), step.url, quality);
        if (!selection.success) {
          return {
            success: false,
            error: formatQualityMessage(selection.availableQualities),
            errorCode: "QUALITY_UNAVAILABLE",
            availableQualities: selection.availableQualities,
          };
        }
        return { success: true, manifestUrl: selection.manifestUrl, hops: hops + 1 };
      }

      case "landing-page":
        current = await resolveLandingPage(step.url, transport);
        break;
    }
  }

  throw new ResolutionParseError(`No fragment manifest reached from ${url} after ${maxHops} steps`);
}
