/**
 * Slices a raw video byte stream into fixed-size frames.
 */

/**
 * Frame index shown at `time`. The small epsilon keeps times computed as
 * `i / fps` on frame `i`.
 *
 * @example
 * frameIndexAt(1 / 3, 3) // => 1 (not 0 from 0.9999999)
 */
export function frameIndexAt(time: number, fps: number): number {
  return Math.floor(time * fps + 1e-5);
}

/**
 * Bytes of one RGB24 frame.
 */
export function rgbFrameSize(width: number, height: number): number {
  return width * height * 3;
}

export class RawFrameReader {
  readonly frameSize: number;
  private readonly iterator: AsyncIterator<Uint8Array>;
  private chunks: Uint8Array[] = [];
  private buffered = 0;
  private done = false;

  constructor(source: AsyncIterable<Uint8Array>, frameSize: number) {
    if (frameSize <= 0) {
      throw new RangeError(`Invalid frame size ${frameSize}`);
    }
    this.iterator = source[Symbol.asyncIterator]();
    this.frameSize = frameSize;
  }

  /**
   * Reads the next complete frame, or null once the stream ends.
   * A trailing partial frame is dropped.
   */
  async next(): Promise<Buffer | null> {
    while (this.buffered < this.frameSize) {
      if (this.done) return null;

      const result = await this.iterator.next();
      if (result.done) {
        this.done = true;
        return null;
      }
      this.chunks.push(result.value);
      this.buffered += result.value.length;
    }

    const data = Buffer.concat(this.chunks, this.buffered);
    const frame = Buffer.from(data.subarray(0, this.frameSize));
    const rest = data.subarray(this.frameSize);

    this.chunks = rest.length > 0 ? [rest] : [];
    this.buffered = rest.length;
    return frame;
  }

  /**
   * Stops reading from the source.
   */
  async close(): Promise<void> {
    if (this.done) return;
    this.done = true;
    await this.iterator.return?.();
  }
}
