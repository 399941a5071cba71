/**
 * Continuous playback over a fragment catalog.
 *
 * Fragments are fetched and decoded lazily as the requested time moves
 * forward. Exactly one decoded fragment is held at a time: the previous one is
 * closed before the next one is fetched.
 */
import { CancelledError, TimelineBoundaryError } from "../shared/errors.js";
import type { HttpTransport } from "../shared/transport.js";
import type { FragmentCatalog } from "./fragmentCatalog.js";
import type { DecodedFragment, FragmentAudio, FragmentDecoder, FrameSource } from "./shared/types.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Receives the audio of every fragment in timeline order.
 */
export interface AudioSink {
  append(audio: FragmentAudio): Promise<void>;
  /** Stands in for a fragment without audio */
  appendSilence(seconds: number): Promise<void>;
}

export interface PlaybackCursor {
  fragmentIndex: number;
  /** Sum of the decoded durations of all previous fragments */
  fragmentStartTime: number;
}

export interface TimelineStitcherOptions {
  catalog: FragmentCatalog;
  transport: HttpTransport;
  decoder: FragmentDecoder;
  audio: AudioSink;
  /** Called after each fragment is decoded, with a 1-based count */
  onFragment?: ((loaded: number, total: number) => void) | undefined;
  /** Checked before every frame; returning false cancels playback */
  shouldContinue?: (() => boolean) | undefined;
}

interface VideoGeometry {
  fps: number;
  width: number;
  height: number;
}

// ============================================================================
// Stitcher
// ============================================================================

export class TimelineStitcher implements FrameSource {
  private readonly catalog: FragmentCatalog;
  private readonly transport: HttpTransport;
  private readonly decoder: FragmentDecoder;
  private readonly audio: AudioSink;
  private readonly onFragment: TimelineStitcherOptions["onFragment"];
  private readonly shouldContinue: TimelineStitcherOptions["shouldContinue"];

  private resident: DecodedFragment | null = null;
  private geometry: VideoGeometry | null = null;
  private fragmentIndex = 0;
  private fragmentStartTime = 0;
  private closed = false;

  constructor(options: TimelineStitcherOptions) {
    this.catalog = options.catalog;
    this.transport = options.transport;
    this.decoder = options.decoder;
    this.audio = options.audio;
    this.onFragment = options.onFragment;
    this.shouldContinue = options.shouldContinue;
  }

  /**
   * Loads the first fragment so that frame rate and size are known.
   */
  async open(): Promise<void> {
    if (!this.resident && !this.geometry) {
      await this.load(0);
    }
  }

  get cursor(): PlaybackCursor {
    return { fragmentIndex: this.fragmentIndex, fragmentStartTime: this.fragmentStartTime };
  }

  /** Seconds of output, after the time limit */
  get duration(): number {
    return this.catalog.totalDuration;
  }

  get fps(): number {
    return this.requireGeometry().fps;
  }

  get width(): number {
    return this.requireGeometry().width;
  }

  get height(): number {
    return this.requireGeometry().height;
  }

  /**
   * Returns the frame at global `time`. Calls must not go back past the start
   * of the current fragment.
   */
  async frameAt(time: number): Promise<Buffer> {
    if (this.closed) {
      throw new Error("Timeline is closed");
    }
    if (this.shouldContinue && !this.shouldContinue()) {
      throw new CancelledError();
    }
    if (!(time >= 0 && time < this.catalog.totalDuration)) {
      throw new TimelineBoundaryError(
        `Time ${time}s is outside the timeline [0, ${this.catalog.totalDuration})`,
        time
      );
    }
    if (time < this.fragmentStartTime) {
      throw new TimelineBoundaryError(
        `Time ${time}s precedes fragment ${this.fragmentIndex} starting at ${this.fragmentStartTime}s`,
        time
      );
    }

    let resident = this.resident ?? (await this.load(this.fragmentIndex));

    while (time - this.fragmentStartTime >= resident.duration) {
      const next = this.fragmentIndex + 1;
      if (next >= this.catalog.fragments.length) {
        throw new TimelineBoundaryError(`Time ${time}s is past the last fragment`, time);
      }

      this.fragmentStartTime += resident.duration;
      await this.release();
      this.fragmentIndex = next;
      resident = await this.load(next);
    }

    return resident.frameAt(time - this.fragmentStartTime);
  }

  /**
   * Releases the resident fragment. Further frame requests fail.
   */
  async close(): Promise<void> {
    this.closed = true;
    await this.release();
  }

  private async load(index: number): Promise<DecodedFragment> {
    const fragment = this.catalog.fragments[index];
    if (!fragment) {
      throw new TimelineBoundaryError(`No fragment ${index} in catalog`, this.fragmentStartTime);
    }

    const response = await this.transport.fetch(fragment.url);
    const decoded = await this.decoder.decode(response.body, { index, url: fragment.url });

    try {
      const audio = await decoded.extractAudio();
      if (audio) {
        await this.audio.append(audio);
      } else {
        await this.audio.appendSilence(decoded.duration);
      }
    } catch (error) {
      await decoded.close();
      throw error;
    }

    this.geometry ??= { fps: decoded.fps, width: decoded.width, height: decoded.height };
    this.resident = decoded;
    this.onFragment?.(index + 1, this.catalog.fragments.length);
    return decoded;
  }

  private async release(): Promise<void> {
    const resident = this.resident;
    this.resident = null;
    if (resident) {
      await resident.close();
    }
  }

  private requireGeometry(): VideoGeometry {
    if (!this.geometry) {
      throw new Error("Timeline is not open");
    }
    return this.geometry;
  }
}
