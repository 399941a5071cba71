/**
 * Fragment decoding through ffprobe/ffmpeg.
 * Each fragment lives in a file in the work directory until it is closed.
 */
import { rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { execa } from "execa";
import { DecodeError } from "../../shared/errors.js";
import { extractPcm, type MediaProbe, probeMedia, rawVideoArgs } from "./ffmpeg.js";
import { frameIndexAt, RawFrameReader, rgbFrameSize } from "./frameReader.js";
import type { DecodedFragment, FragmentAudio, FragmentDecoder, FragmentRef } from "./types.js";

/**
 * Starts a process writing raw frames of `path` to its stdout.
 */
export type FrameStreamFactory = (path: string, width: number, height: number) => FrameStream;

export interface FrameStream {
  frames: AsyncIterable<Uint8Array>;
  stop(): Promise<void>;
}

/* v8 ignore start */
export const ffmpegFrameStream: FrameStreamFactory = (path, width, height) => {
  const subprocess = execa("ffmpeg", rawVideoArgs(path, width, height), {
    reject: false,
    buffer: false,
    stderr: "ignore",
  });
  return {
    frames: subprocess.stdout,
    stop: async () => {
      subprocess.kill();
      await subprocess;
    },
  };
};
/* v8 ignore stop */

export interface FragmentFileOptions {
  path: string;
  ref: FragmentRef;
  probe: MediaProbe;
  /** Where the PCM dump is written */
  pcmPath: string;
  openFrames?: FrameStreamFactory | undefined;
  extractAudio?: typeof extractPcm | undefined;
}

/**
 * A decoded fragment reading frames sequentially from ffmpeg.
 *
 * Reading is forward-only: asking for the same frame again returns the cached
 * one, asking for an earlier frame restarts ffmpeg, and asking past the end
 * holds the final frame.
 */
export class FragmentFile implements DecodedFragment {
  readonly duration: number;
  readonly fps: number;
  readonly width: number;
  readonly height: number;

  private readonly options: FragmentFileOptions;
  private readonly openFrames: FrameStreamFactory;
  private stream: FrameStream | null = null;
  private reader: RawFrameReader | null = null;
  private frameIndex = -1;
  private lastFrame: Buffer | null = null;
  private exhausted = false;
  private closed = false;

  constructor(options: FragmentFileOptions) {
    this.options = options;
    this.openFrames = options.openFrames ?? ffmpegFrameStream;
    this.duration = options.probe.duration;
    this.fps = options.probe.fps;
    this.width = options.probe.width;
    this.height = options.probe.height;
  }

  async frameAt(localTime: number): Promise<Buffer> {
    if (this.closed) {
      throw new DecodeError(`Fragment ${this.options.ref.index} is closed`);
    }

    const target = Math.max(0, frameIndexAt(localTime, this.fps));
    if (target < this.frameIndex) {
      await this.rewind();
    }

    while (this.frameIndex < target && !this.exhausted) {
      const frame = await this.openReader().next();
      if (!frame) {
        this.exhausted = true;
        await this.stopReader();
        break;
      }
      this.lastFrame = frame;
      this.frameIndex++;
    }

    if (!this.lastFrame) {
      throw new DecodeError(
        `No video frames decoded from fragment ${this.options.ref.index} (${this.options.ref.url})`
      );
    }
    return this.lastFrame;
  }

  async extractAudio(): Promise<FragmentAudio | null> {
    const audio = this.options.probe.audio;
    if (!audio) return null;

    const extract = this.options.extractAudio ?? extractPcm;
    return extract(this.options.path, this.options.pcmPath, audio);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.stopReader();
    await rm(this.options.path, { force: true });
  }

  private openReader(): RawFrameReader {
    if (!this.reader) {
      this.stream = this.openFrames(this.options.path, this.width, this.height);
      this.reader = new RawFrameReader(this.stream.frames, rgbFrameSize(this.width, this.height));
    }
    return this.reader;
  }

  private async stopReader(): Promise<void> {
    const { reader, stream } = this;
    this.reader = null;
    this.stream = null;
    await reader?.close();
    await stream?.stop();
  }

  private async rewind(): Promise<void> {
    await this.stopReader();
    this.frameIndex = -1;
    this.lastFrame = null;
    this.exhausted = false;
  }
}

/**
 * Writes fragment bytes to `workDir`, probes them and wraps the result.
 */
export class FfmpegFragmentDecoder implements FragmentDecoder {
  private readonly workDir: string;
  private readonly probe: (path: string) => Promise<MediaProbe>;
  private readonly openFrames: FrameStreamFactory | undefined;

  constructor(
    workDir: string,
    probe: (path: string) => Promise<MediaProbe> = probeMedia,
    openFrames?: FrameStreamFactory
  ) {
    this.workDir = workDir;
    this.probe = probe;
    this.openFrames = openFrames;
  }

  async decode(bytes: Buffer, ref: FragmentRef): Promise<DecodedFragment> {
    const path = join(this.workDir, `fragment-${ref.index}.mp4`);
    await writeFile(path, bytes);

    let probe: MediaProbe;
    try {
      probe = await this.probe(path);
    } catch (error) {
      await rm(path, { force: true });
      throw error;
    }

    return new FragmentFile({
      path,
      ref,
      probe,
      pcmPath: join(this.workDir, `fragment-${ref.index}.pcm`),
      openFrames: this.openFrames,
    });
  }
}
