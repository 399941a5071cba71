/**
 * Shared types for stream stitching.
 * The engine talks to ffmpeg only through the interfaces declared here.
 */

// ============================================================================
// Audio Types
// ============================================================================

/**
 * PCM layout of an audio track. Fixed for a whole download.
 */
export interface AudioFormat {
  channels: number;
  sampleRate: number;
  /** Bits per sample; samples are signed little-endian */
  bitDepth: number;
}

/**
 * Decoded audio of one fragment.
 */
export interface FragmentAudio {
  format: AudioFormat;
  /** Interleaved PCM samples */
  samples: Buffer;
}

/**
 * A finished WAV file handed over to the muxer.
 */
export interface FinalizedAudio {
  path: string;
  format: AudioFormat;
  dataBytes: number;
  /** Duration in seconds */
  duration: number;
}

// ============================================================================
// Fragment Decoding
// ============================================================================

/**
 * Identifies the fragment being decoded, for file naming and messages.
 */
export interface FragmentRef {
  index: number;
  url: string;
}

/**
 * One decoded fragment. Holds a temporary file until closed.
 */
export interface DecodedFragment {
  /** Duration in seconds as reported by the decoder */
  readonly duration: number;
  readonly fps: number;
  readonly width: number;
  readonly height: number;
  /** Returns an RGB24 frame at a time relative to the fragment start */
  frameAt(localTime: number): Promise<Buffer>;
  /** Decodes the audio track, or null when the fragment has none */
  extractAudio(): Promise<FragmentAudio | null>;
  /** Releases readers and deletes the backing file */
  close(): Promise<void>;
}

export interface FragmentDecoder {
  decode(bytes: Buffer, ref: FragmentRef): Promise<DecodedFragment>;
}

// ============================================================================
// Encoding
// ============================================================================

/**
 * Anything producing RGB24 frames on a global timeline.
 */
export interface FrameSource {
  readonly fps: number;
  readonly width: number;
  readonly height: number;
  frameAt(time: number): Promise<Buffer>;
}

export interface VideoSpec {
  fps: number;
  width: number;
  height: number;
  /** Seconds of video to render */
  duration: number;
}

/**
 * Called after each rendered frame.
 */
export type FrameProgressCallback = (renderedFrames: number, totalFrames: number) => void;

/**
 * External media tooling used by the download coordinator.
 */
export interface MediaBackend {
  isAvailable(): Promise<boolean>;
  createDecoder(workDir: string): FragmentDecoder;
  encodeVideo(
    source: FrameSource,
    spec: VideoSpec,
    outputPath: string,
    onProgress?: FrameProgressCallback
  ): Promise<void>;
  /** Muxes audio into the video, or copies the video when there is no audio */
  muxAudio(videoPath: string, audio: FinalizedAudio | null, outputPath: string): Promise<void>;
}

// ============================================================================
// Progress Types
// ============================================================================

/**
 * Download phase indicators.
 */
export type DownloadPhase = "resolving" | "rendering" | "merging" | "complete";

/**
 * Progress of a stream download.
 */
export interface DownloadProgress {
  /** Progress percentage (0-100) */
  percent: number;
  phase?: DownloadPhase | undefined;
  renderedFrames?: number | undefined;
  totalFrames?: number | undefined;
  /** Fragments fetched so far */
  downloadedFragments?: number | undefined;
  totalFragments?: number | undefined;
}

export type ProgressCallback = (progress: DownloadProgress) => void;

// ============================================================================
// Download Result Types
// ============================================================================

/**
 * Error codes returned (rather than thrown) by a stream download.
 */
export type DownloadErrorCode = "FFMPEG_NOT_FOUND" | "QUALITY_UNAVAILABLE";

export interface DownloadResult {
  success: boolean;
  error?: string | undefined;
  errorCode?: DownloadErrorCode | undefined;
  outputPath?: string | undefined;
}

export interface StreamDownloadResult extends DownloadResult {
  /** Seconds of video written */
  duration?: number | undefined;
  fragmentCount?: number | undefined;
  /** Set with QUALITY_UNAVAILABLE, ascending */
  availableQualities?: number[] | undefined;
}
