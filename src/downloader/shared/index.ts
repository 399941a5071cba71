/**
 * Shared utilities for stream stitching.
 */

// Types
export type {
  AudioFormat,
  DecodedFragment,
  DownloadErrorCode,
  DownloadPhase,
  DownloadProgress,
  DownloadResult,
  FinalizedAudio,
  FragmentAudio,
  FragmentDecoder,
  FragmentRef,
  FrameProgressCallback,
  FrameSource,
  MediaBackend,
  ProgressCallback,
  StreamDownloadResult,
  VideoSpec,
} from "./types.js";

// FFmpeg utilities
export {
  checkFfmpeg,
  encodeArgs,
  encodeFrames,
  extractPcm,
  frameTimes,
  mergeVideoAudio,
  parseFrameRate,
  parseProbeOutput,
  probeMedia,
  rawVideoArgs,
  type MediaProbe,
} from "./ffmpeg.js";

// Decoding
export { frameIndexAt, RawFrameReader, rgbFrameSize } from "./frameReader.js";
export { FfmpegFragmentDecoder, FragmentFile, ffmpegFrameStream } from "./fragmentDecoder.js";
export type { FrameStream, FrameStreamFactory } from "./fragmentDecoder.js";

// WAV
export { blockAlign, createWavHeader, pcmDuration, WAV_HEADER_SIZE } from "./wav.js";

// Backend
export { ffmpegBackend } from "./backend.js";
