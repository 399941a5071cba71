/**
 * Collects the PCM audio of every fragment into one WAV file.
 * The first appended fragment fixes the format for the whole stream.
 * Fragments without audio become silence of their duration, so the audio
 * stays aligned with the video timeline.
 */
import { type FileHandle, open, rm } from "node:fs/promises";
import { FormatMismatchError } from "../shared/errors.js";
import type { AudioFormat, FinalizedAudio, FragmentAudio } from "./shared/types.js";
import { blockAlign, createWavHeader, pcmDuration, WAV_HEADER_SIZE } from "./shared/wav.js";

function describeFormat(format: AudioFormat): string {
  return `${format.channels}ch ${format.sampleRate}Hz ${format.bitDepth}-bit`;
}

/**
 * PCM bytes for `seconds` of silence. 8-bit PCM is unsigned and centred on 128.
 */
export function silence(format: AudioFormat, seconds: number): Buffer {
  const frames = Math.round(seconds * format.sampleRate);
  return Buffer.alloc(frames * blockAlign(format), format.bitDepth === 8 ? 0x80 : 0);
}

function sameFormat(a: AudioFormat, b: AudioFormat): boolean {
  return a.channels === b.channels && a.sampleRate === b.sampleRate && a.bitDepth === b.bitDepth;
}

export class AudioAccumulator {
  readonly path: string;
  private handle: FileHandle | null;
  private format: AudioFormat | null = null;
  private dataBytes = 0;
  /** Silence requested before the format was known */
  private leadingSilence = 0;
  private finalized = false;

  private constructor(path: string, handle: FileHandle) {
    this.path = path;
    this.handle = handle;
  }

  /**
   * Opens `path` for writing and reserves room for the header.
   */
  static async create(path: string): Promise<AudioAccumulator> {
    const handle = await open(path, "w");
    try {
      await handle.write(Buffer.alloc(WAV_HEADER_SIZE), 0, WAV_HEADER_SIZE, 0);
    } catch (error) {
      await handle.close();
      throw error;
    }
    return new AudioAccumulator(path, handle);
  }

  async append(audio: FragmentAudio): Promise<void> {
    const handle = this.openHandle();

    if (!this.format) {
      this.format = { ...audio.format };
      if (this.leadingSilence > 0) {
        await this.write(handle, silence(this.format, this.leadingSilence));
        this.leadingSilence = 0;
      }
    } else if (!sameFormat(this.format, audio.format)) {
      throw new FormatMismatchError(
        `Fragment audio is ${describeFormat(audio.format)}, stream is ${describeFormat(this.format)}`
      );
    }

    await this.write(handle, audio.samples);
  }

  /**
   * Appends `seconds` of silence for a fragment without audio. Before the
   * first fragment with audio the silence is held back and written once the
   * format is known.
   */
  async appendSilence(seconds: number): Promise<void> {
    const handle = this.openHandle();

    if (!this.format) {
      this.leadingSilence += seconds;
      return;
    }
    await this.write(handle, silence(this.format, seconds));
  }

  /**
   * Writes the header and closes the file.
   * Returns null when no fragment carried audio.
   */
  async finalize(): Promise<FinalizedAudio | null> {
    const handle = this.openHandle();
    const format = this.format;
    this.handle = null;

    if (!format) {
      await handle.close();
      return null;
    }

    try {
      await handle.write(createWavHeader(format, this.dataBytes), 0, WAV_HEADER_SIZE, 0);
      this.finalized = true;
    } finally {
      await handle.close();
    }

    return {
      path: this.path,
      format,
      dataBytes: this.dataBytes,
      duration: pcmDuration(format, this.dataBytes),
    };
  }

  /**
   * Closes the file if still open and deletes it unless it was finalized.
   * Safe to call more than once.
   */
  async dispose(): Promise<void> {
    const handle = this.handle;
    this.handle = null;
    if (handle) {
      await handle.close();
    }
    if (!this.finalized) {
      await rm(this.path, { force: true });
    }
  }

  private async write(handle: FileHandle, bytes: Buffer): Promise<void> {
    await handle.write(bytes, 0, bytes.length, WAV_HEADER_SIZE + this.dataBytes);
    this.dataBytes += bytes.length;
  }

  private openHandle(): FileHandle {
    if (!this.handle) {
      throw new Error(`Audio file ${this.path} is already closed`);
    }
    return this.handle;
  }
}
