/**
 * MediaBackend backed by the ffmpeg and ffprobe binaries.
 */
import { checkFfmpeg, encodeFrames, mergeVideoAudio } from "./ffmpeg.js";
import { FfmpegFragmentDecoder } from "./fragmentDecoder.js";
import type { MediaBackend } from "./types.js";

export const ffmpegBackend: MediaBackend = {
  isAvailable: checkFfmpeg,
  createDecoder: (workDir) => new FfmpegFragmentDecoder(workDir),
  encodeVideo: encodeFrames,
  muxAudio: mergeVideoAudio,
};
