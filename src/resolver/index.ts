/**
 * Manifest resolution: landing page → session → API → quality manifest.
 */

export {
  classifyStreamUrl,
  DEFAULT_MAX_HOPS,
  parseQualityLevels,
  resolveLandingPage,
  resolveManifestUrl,
  selectQuality,
  type ManifestResolution,
  type QualityLevel,
  type QualitySelection,
  type ResolveOptions,
  type StreamUrl,
} from "./manifestResolver.js";

export {
  contentIdFromPage,
  contentIdFromUrl,
  extractSessionContext,
  findCookie,
  sessionRequestOptions,
  SESSION_COOKIE,
  videoApiUrl,
  type SessionContext,
} from "./session.js";

export { extractMasterPlaylistUrl, VideoLiveUpdatesSchema } from "./schemas.js";
