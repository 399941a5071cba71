/**
 * Error types raised while resolving and stitching a stream.
 * Only TransientNetworkError is ever retried.
 */

export type StreamErrorCode =
  | "NETWORK_ERROR"
  | "QUALITY_UNAVAILABLE"
  | "PARSE_ERROR"
  | "FORMAT_MISMATCH"
  | "TIMELINE_BOUNDARY"
  | "DECODE_ERROR"
  | "CANCELLED";

/**
 * Base class carrying a stable error code.
 */
export class StreamError extends Error {
  public readonly code: StreamErrorCode;

  constructor(message: string, code: StreamErrorCode, options?: ErrorOptions) {
    super(message, options);
    this.name = "StreamError";
    this.code = code;
  }
}

/**
 * Connection-level failure (refused, reset, DNS, timeout).
 */
export class TransientNetworkError extends StreamError {
  public readonly url: string;

  constructor(url: string, options?: ErrorOptions) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Connection error to "${url}"${reason}`, "NETWORK_ERROR", options);
    this.name = "TransientNetworkError";
    this.url = url;
  }
}

/**
 * Builds the user-facing list of available bitrates.
 *
 * @example
 * formatQualityMessage([1200000, 3200000])
 * // => "Incorrect quality level. The available quality levels are:\n  1200000\n  3200000"
 */
export function formatQualityMessage(availableQualities: readonly number[]): string {
  const lines = availableQualities.map((q) => String(q)).join("\n  ");
  return `Incorrect quality level. The available quality levels are:\n  ${lines}`;
}

export class ResolutionParseError extends StreamError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "PARSE_ERROR", options);
    this.name = "ResolutionParseError";
  }
}

export class FormatMismatchError extends StreamError {
  constructor(message: string) {
    super(message, "FORMAT_MISMATCH");
    this.name = "FormatMismatchError";
  }
}

export class TimelineBoundaryError extends StreamError {
  public readonly time: number;

  constructor(message: string, time: number) {
    super(message, "TIMELINE_BOUNDARY");
    this.name = "TimelineBoundaryError";
    this.time = time;
  }
}

export class DecodeError extends StreamError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, "DECODE_ERROR", options);
    this.name = "DecodeError";
  }
}

/**
 * Raised when rendering stops because shutdown was requested.
 */
export class CancelledError extends StreamError {
  constructor(message = "Download cancelled") {
    super(message, "CANCELLED");
    this.name = "CancelledError";
  }
}

/**
 * Extracts a printable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
