/**
 * Stream download: fragment catalog, timeline stitching and coordination.
 */

export { downloadStream, type StreamDownloadOptions } from "./streamDownloader.js";

export {
  fetchFragmentCatalog,
  parseDurationLine,
  parseFragmentCatalog,
  type Fragment,
  type FragmentCatalog,
} from "./fragmentCatalog.js";

export {
  TimelineStitcher,
  type AudioSink,
  type PlaybackCursor,
  type TimelineStitcherOptions,
} from "./timelineStitcher.js";

export { AudioAccumulator } from "./audioAccumulator.js";

// Shared utilities & types
export {
  checkFfmpeg,
  ffmpegBackend,
  type AudioFormat,
  type DecodedFragment,
  type DownloadPhase,
  type DownloadProgress,
  type DownloadResult,
  type FinalizedAudio,
  type FragmentAudio,
  type FragmentDecoder,
  type FrameSource,
  type MediaBackend,
  type ProgressCallback,
  type StreamDownloadResult,
  type VideoSpec,
} from "./shared/index.js";
