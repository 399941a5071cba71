/**
 * FFmpeg utilities: probing, PCM extraction, raw-frame encoding and muxing.
 */
import { once } from "node:events";
import { copyFile, readFile, rm } from "node:fs/promises";
import { execa } from "execa";
import { z } from "zod";
import { DecodeError, errorMessage } from "../../shared/errors.js";
import type { FinalizedAudio, FragmentAudio, FrameProgressCallback, FrameSource, VideoSpec } from "./types.js";

// ============================================================================
// FFmpeg Availability
// ============================================================================

/**
 * Checks if ffmpeg and ffprobe are available on the system.
 */
/* v8 ignore next 9 */
export async function checkFfmpeg(): Promise<boolean> {
  try {
    await execa("ffmpeg", ["-version"]);
    await execa("ffprobe", ["-version"]);
    return true;
  } catch {
    return false;
  }
}

// ============================================================================
// Probing
// ============================================================================

const ProbeStreamSchema = z
  .object({
    codec_type: z.string(),
    width: z.number().int().optional(),
    height: z.number().int().optional(),
    avg_frame_rate: z.string().optional(),
    r_frame_rate: z.string().optional(),
    duration: z.string().optional(),
    channels: z.number().int().optional(),
    sample_rate: z.string().optional(),
  })
  .passthrough();

const ProbeOutputSchema = z
  .object({
    streams: z.array(ProbeStreamSchema),
    format: z
      .object({
        duration: z.string().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

type ProbeStream = z.infer<typeof ProbeStreamSchema>;

export interface MediaProbe {
  /** Seconds */
  duration: number;
  fps: number;
  width: number;
  height: number;
  audio: { channels: number; sampleRate: number } | null;
}

/**
 * Parses an ffprobe rate such as "30000/1001" or "25".
 * @returns Frames per second, or 0 if not a positive rate.
 */
export function parseFrameRate(rate: string | undefined): number {
  if (!rate) return 0;

  const [numerator = "", denominator = "1"] = rate.split("/");
  const value = Number(numerator) / Number(denominator);
  return Number.isFinite(value) && value > 0 ? value : 0;
}

function positiveNumber(value: string | undefined): number {
  const parsed = Number(value);
  return value !== undefined && Number.isFinite(parsed) && parsed > 0 ? parsed : 0;
}

/**
 * Turns `ffprobe -print_format json -show_format -show_streams` output into
 * the properties the stitcher needs.
 */
export function parseProbeOutput(output: string, source = "media"): MediaProbe {
  let json: unknown;
  try {
    json = JSON.parse(output);
  } catch (error) {
    throw new DecodeError(`ffprobe returned invalid JSON for ${source}`, { cause: error });
  }

  const result = ProbeOutputSchema.safeParse(json);
  if (!result.success) {
    throw new DecodeError(`Unexpected ffprobe output for ${source}`, { cause: result.error });
  }

  const { streams, format } = result.data;
  const video = streams.find((s) => s.codec_type === "video");
  if (!video?.width || !video.height) {
    throw new DecodeError(`No video stream in ${source}`);
  }

  const fps = parseFrameRate(video.avg_frame_rate) || parseFrameRate(video.r_frame_rate);
  if (!fps) {
    throw new DecodeError(`Unknown frame rate in ${source}`);
  }

  const duration = positiveNumber(format?.duration) || positiveNumber(video.duration);
  if (!duration) {
    throw new DecodeError(`Unknown duration of ${source}`);
  }

  return {
    duration,
    fps,
    width: video.width,
    height: video.height,
    audio: parseAudioStream(streams.find((s) => s.codec_type === "audio")),
  };
}

function parseAudioStream(stream: ProbeStream | undefined): MediaProbe["audio"] {
  const sampleRate = positiveNumber(stream?.sample_rate);
  if (!stream?.channels || !sampleRate) return null;
  return { channels: stream.channels, sampleRate };
}

/* v8 ignore start */
export async function probeMedia(path: string): Promise<MediaProbe> {
  try {
    const { stdout } = await execa("ffprobe", [
      "-v",
      "error",
      "-print_format",
      "json",
      "-show_format",
      "-show_streams",
      path,
    ]);
    return parseProbeOutput(stdout, path);
  } catch (error) {
    if (error instanceof DecodeError) throw error;
    throw new DecodeError(`ffprobe failed on ${path}: ${errorMessage(error)}`, { cause: error });
  }
}
/* v8 ignore stop */

// ============================================================================
// Decoding
// ============================================================================

export const PCM_BIT_DEPTH = 16;

/**
 * Arguments streaming a video as RGB24 frames to stdout.
 */
export function rawVideoArgs(inputPath: string, width: number, height: number): string[] {
  return [
    "-v",
    "error",
    "-nostdin",
    "-i",
    inputPath,
    "-an",
    "-f",
    "rawvideo",
    "-pix_fmt",
    "rgb24",
    "-s",
    `${width}x${height}`,
    "pipe:1",
  ];
}

/**
 * Decodes the audio track of `inputPath` to signed 16-bit little-endian PCM,
 * keeping its channel count and sample rate.
 */
/* v8 ignore start */
export async function extractPcm(
  inputPath: string,
  pcmPath: string,
  audio: { channels: number; sampleRate: number }
): Promise<FragmentAudio> {
  try {
    await execa("ffmpeg", [
      "-v",
      "error",
      "-nostdin",
      "-y",
      "-i",
      inputPath,
      "-vn",
      "-f",
      "s16le",
      "-acodec",
      "pcm_s16le",
      "-ac",
      String(audio.channels),
      "-ar",
      String(audio.sampleRate),
      pcmPath,
    ]);
    const samples = await readFile(pcmPath);
    return {
      format: { channels: audio.channels, sampleRate: audio.sampleRate, bitDepth: PCM_BIT_DEPTH },
      samples,
    };
  } catch (error) {
    throw new DecodeError(`Could not extract audio from ${inputPath}: ${errorMessage(error)}`, {
      cause: error,
    });
  } finally {
    await rm(pcmPath, { force: true });
  }
}
/* v8 ignore stop */

// ============================================================================
// Encoding
// ============================================================================

/**
 * Presentation times of every frame in `duration` seconds at `fps`.
 *
 * @example
 * frameTimes(0.1, 30) // => [0, 1/30, 2/30]
 */
export function frameTimes(duration: number, fps: number): number[] {
  const count = Math.floor(duration * fps);
  return Array.from({ length: count }, (_, i) => i / fps);
}

/**
 * Arguments encoding RGB24 frames from stdin to H.264.
 */
export function encodeArgs(spec: VideoSpec, outputPath: string): string[] {
  return [
    "-v",
    "error",
    "-y",
    "-f",
    "rawvideo",
    "-pix_fmt",
    "rgb24",
    "-s",
    `${spec.width}x${spec.height}`,
    "-r",
    String(spec.fps),
    "-i",
    "pipe:0",
    "-an",
    "-vf",
    "pad=ceil(iw/2)*2:ceil(ih/2)*2",
    "-c:v",
    "libx264",
    "-pix_fmt",
    "yuv420p",
    outputPath,
  ];
}

/**
 * Renders `spec.duration` seconds of `source` into a silent video file.
 * Frames are requested strictly in time order.
 */
/* v8 ignore start */
export async function encodeFrames(
  source: FrameSource,
  spec: VideoSpec,
  outputPath: string,
  onProgress?: FrameProgressCallback
): Promise<void> {
  const times = frameTimes(spec.duration, spec.fps);
  const frameSize = spec.width * spec.height * 3;
  const subprocess = execa("ffmpeg", encodeArgs(spec, outputPath), {
    stdout: "ignore",
    reject: false,
  });
  const stdin = subprocess.stdin;

  try {
    for (const [index, time] of times.entries()) {
      const frame = await source.frameAt(time);
      if (frame.length !== frameSize) {
        throw new DecodeError(
          `Frame at ${time}s has ${frame.length} bytes, expected ${frameSize} (${spec.width}x${spec.height})`
        );
      }
      if (!stdin.write(frame)) {
        await once(stdin, "drain");
      }
      onProgress?.(index + 1, times.length);
    }
    stdin.end();
  } catch (error) {
    subprocess.kill();
    await subprocess;
    throw error;
  }

  const result = await subprocess;
  if (result.failed) {
    throw new DecodeError(
      `ffmpeg failed to encode ${outputPath} (exit code ${result.exitCode ?? "none"})`
    );
  }
}

// ============================================================================
// Muxing
// ============================================================================

/**
 * Merges a silent video with a WAV file, or copies the video when there is
 * no audio.
 */
export async function mergeVideoAudio(
  videoPath: string,
  audio: FinalizedAudio | null,
  outputPath: string
): Promise<void> {
  if (!audio) {
    await copyFile(videoPath, outputPath);
    return;
  }

  await execa(
    "ffmpeg",
    [
      "-v",
      "error",
      "-nostdin",
      "-i",
      videoPath,
      "-i",
      audio.path,
      "-c:v",
      "copy",
      "-c:a",
      "aac",
      "-shortest",
      "-y",
      outputPath,
    ],
    { stdio: "ignore" }
  );
}
/* v8 ignore stop */
