/**
 * RIFF/WAVE header for integer PCM.
 */
import type { AudioFormat } from "./types.js";

export const WAV_HEADER_SIZE = 44;

const PCM_FORMAT_TAG = 1;

/**
 * Bytes per interleaved sample frame (one sample for every channel).
 */
export function blockAlign(format: AudioFormat): number {
  return format.channels * (format.bitDepth / 8);
}

/**
 * Seconds of audio in `dataBytes` bytes of PCM.
 */
export function pcmDuration(format: AudioFormat, dataBytes: number): number {
  return dataBytes / (format.sampleRate * blockAlign(format));
}

/**
 * Builds the 44-byte canonical header for `dataBytes` bytes of samples.
 */
export function createWavHeader(format: AudioFormat, dataBytes: number): Buffer {
  const header = Buffer.alloc(WAV_HEADER_SIZE);
  const align = blockAlign(format);

  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(36 + dataBytes, 4);
  header.write("WAVE", 8, "ascii");

  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(PCM_FORMAT_TAG, 20);
  header.writeUInt16LE(format.channels, 22);
  header.writeUInt32LE(format.sampleRate, 24);
  header.writeUInt32LE(format.sampleRate * align, 28);
  header.writeUInt16LE(align, 32);
  header.writeUInt16LE(format.bitDepth, 34);

  header.write("data", 36, "ascii");
  header.writeUInt32LE(dataBytes, 40);

  return header;
}
