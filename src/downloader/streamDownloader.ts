/**
 * Stream download coordination: resolve, stitch, encode, mux.
 */
import { mkdir, mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { WORK_DIR_PREFIX } from "../config/paths.js";
import { resolveManifestUrl } from "../resolver/index.js";
import { errorMessage } from "../shared/errors.js";
import type { HttpTransport } from "../shared/transport.js";
import { AudioAccumulator } from "./audioAccumulator.js";
import { fetchFragmentCatalog } from "./fragmentCatalog.js";
import {
  ffmpegBackend,
  type DownloadProgress,
  type MediaBackend,
  type ProgressCallback,
  type StreamDownloadResult,
} from "./shared/index.js";
import { TimelineStitcher } from "./timelineStitcher.js";

export interface StreamDownloadOptions {
  /** Landing page, quality manifest or fragment manifest URL */
  url: string;
  outputPath: string;
  /** Bitrate of the quality level to download */
  quality: number;
  /** Seconds to keep; 0 keeps everything */
  timeLimit?: number | undefined;
  transport: HttpTransport;
  maxHops?: number | undefined;
  /** Parent of the temporary work directory (defaults to the OS temp dir) */
  tempRoot?: string | undefined;
  onProgress?: ProgressCallback | undefined;
  onStatus?: ((message: string) => void) | undefined;
  /** Receives the cleanup routine so it can also run on process signals */
  registerCleanup?: ((cleanup: () => Promise<void>) => void) | undefined;
  /** Polled before every frame; returning false stops rendering */
  shouldContinue?: (() => boolean) | undefined;
}

/**
 * Downloads one stream into a single muxed file.
 *
 * Missing ffmpeg and an unavailable quality level are returned as failed
 * results; anything else is thrown. The work directory is removed on every
 * path.
 */
export async function downloadStream(
  options: StreamDownloadOptions,
  backend: MediaBackend = ffmpegBackend
): Promise<StreamDownloadResult> {
  const { url, outputPath, quality, transport, onProgress, onStatus } = options;

  if (!(await backend.isAvailable())) {
    return {
      success: false,
      error: "ffmpeg not found. Please install ffmpeg (including ffprobe) first.",
      errorCode: "FFMPEG_NOT_FOUND",
    };
  }

  onProgress?.({ phase: "resolving", percent: 0 });
  const resolution = await resolveManifestUrl(url, quality, transport, {
    maxHops: options.maxHops,
  });
  if (!resolution.success) {
    return {
      success: false,
      error: resolution.error,
      errorCode: resolution.errorCode,
      availableQualities: resolution.availableQualities,
    };
  }
  onStatus?.(`Manifest: ${resolution.manifestUrl}`);

  const catalog = await fetchFragmentCatalog(resolution.manifestUrl, transport, options.timeLimit);
  const totalFragments = catalog.fragments.length;
  onStatus?.(
    `${totalFragments} fragments, ${catalog.fullDuration.toFixed(1)}s` +
      (catalog.totalDuration < catalog.fullDuration
        ? `, limited to ${catalog.totalDuration.toFixed(1)}s`
        : "")
  );

  const workDir = await mkdtemp(join(options.tempRoot ?? tmpdir(), WORK_DIR_PREFIX));
  let audio: AudioAccumulator | null = null;
  let stitcher: TimelineStitcher | null = null;

  // Every step runs even when an earlier one fails; the first failure is re-thrown
  const cleanup = async (): Promise<void> => {
    const steps = [
      () => stitcher?.close(),
      () => audio?.dispose(),
      () => rm(workDir, { recursive: true, force: true }),
    ];
    const failures: unknown[] = [];
    for (const step of steps) {
      try {
        await step();
      } catch (error) {
        failures.push(error);
      }
    }
    if (failures.length > 0) {
      throw failures[0];
    }
  };
  options.registerCleanup?.(cleanup);

  const progress: DownloadProgress = { phase: "rendering", percent: 0, totalFragments };
  let failed = false;

  try {
    audio = await AudioAccumulator.create(join(workDir, "audio.wav"));
    stitcher = new TimelineStitcher({
      catalog,
      transport,
      decoder: backend.createDecoder(workDir),
      audio,
      onFragment: (loaded) => {
        progress.downloadedFragments = loaded;
      },
      shouldContinue: options.shouldContinue,
    });

    await stitcher.open();
    const spec = {
      fps: stitcher.fps,
      width: stitcher.width,
      height: stitcher.height,
      duration: catalog.totalDuration,
    };
    onStatus?.(`${spec.width}x${spec.height} at ${spec.fps.toFixed(2)} fps`);

    const videoPath = join(workDir, "video.mp4");
    await backend.encodeVideo(stitcher, spec, videoPath, (renderedFrames, totalFrames) => {
      progress.renderedFrames = renderedFrames;
      progress.totalFrames = totalFrames;
      progress.percent = Math.round((renderedFrames / totalFrames) * 100);
      onProgress?.({ ...progress });
    });
    await stitcher.close();

    const finalAudio = await audio.finalize();
    onProgress?.({ ...progress, phase: "merging", percent: 100 });

    await mkdir(dirname(outputPath), { recursive: true });
    await backend.muxAudio(videoPath, finalAudio, outputPath);
    onProgress?.({ ...progress, phase: "complete", percent: 100 });

    return {
      success: true,
      outputPath,
      duration: catalog.totalDuration,
      fragmentCount: progress.downloadedFragments,
    };
  } catch (error) {
    failed = true;
    throw error;
  } finally {
    try {
      await cleanup();
    } catch (cleanupError) {
      if (!failed) {
        throw cleanupError;
      }
      // The download error is the one that propagates
      console.warn(`Cleanup of ${workDir} failed: ${errorMessage(cleanupError)}`);
    }
  }
}
