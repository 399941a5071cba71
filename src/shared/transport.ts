/**
 * Network access with a fixed-interval retry policy.
 * Connection-level failures are retried; everything else surfaces immediately.
 */
import isNetworkError from "is-network-error";
import { TimeoutError } from "ky";
import pRetry, { AbortError } from "p-retry";
import type { RetryPolicy } from "../config/schema.js";
import { TransientNetworkError } from "./errors.js";
import { http } from "./http.js";

// ============================================================================
// Types
// ============================================================================

export interface RequestOptions {
  headers?: Record<string, string> | undefined;
}

/**
 * A fully buffered response.
 */
export interface TransportResponse {
  /** Final URL after redirects */
  url: string;
  status: number;
  headers: Headers;
  body: Buffer;
}

/**
 * Performs a single request attempt. Must throw TransientNetworkError for
 * failures worth retrying.
 */
export type Sender = (target: string, options: RequestOptions) => Promise<TransportResponse>;

/**
 * Anything that can fetch a URL into a TransportResponse.
 */
export interface HttpTransport {
  fetch(target: string, options?: RequestOptions): Promise<TransportResponse>;
}

// ============================================================================
// Single Attempt
// ============================================================================

/**
 * True for failures of the connection itself: a fetch that could not reach
 * the server, or a ky timeout. A malformed URL is a TypeError too, but not one
 * of these.
 */
export function isTransientFailure(error: unknown): boolean {
  return error instanceof TimeoutError || isNetworkError(error);
}

/**
 * Sends one GET request through the shared ky client.
 * Connection failures become TransientNetworkError; HTTP error statuses stay
 * ky HTTPErrors.
 */
export async function sendRequest(
  target: string,
  options: RequestOptions
): Promise<TransportResponse> {
  try {
    const response = await http.get(target, options.headers ? { headers: options.headers } : {});
    const body = Buffer.from(await response.arrayBuffer());
    return {
      url: response.url || target,
      status: response.status,
      headers: response.headers,
      body,
    };
  } catch (error) {
    if (isTransientFailure(error)) {
      throw new TransientNetworkError(target, { cause: error });
    }
    throw error;
  }
}

/**
 * Decodes a response body as UTF-8 text.
 */
export function responseText(response: TransportResponse): string {
  return response.body.toString("utf-8");
}

// ============================================================================
// Retrying Fetch
// ============================================================================

/**
 * Fetches a URL, retrying transient failures up to `policy.maxAttempts` times
 * with `policy.waitSeconds` between attempts. When attempts run out, the last
 * TransientNetworkError is re-thrown as is.
 */
export async function fetchWithRetry(
  target: string,
  policy: RetryPolicy,
  options: RequestOptions = {},
  send: Sender = sendRequest
): Promise<TransportResponse> {
  const waitMs = policy.waitSeconds * 1000;
  let lastError: TransientNetworkError | undefined;

  try {
    return await pRetry(
      async () => {
        try {
          return await send(target, options);
        } catch (error) {
          if (error instanceof TransientNetworkError) {
            lastError = error;
            throw error;
          }
          throw new AbortError(error instanceof Error ? error : new Error(String(error)));
        }
      },
      {
        retries: policy.maxAttempts - 1,
        factor: 1,
        minTimeout: waitMs,
        maxTimeout: waitMs,
        randomize: false,
        onFailedAttempt: (error) => {
          console.warn(
            `Connection error to "${target}" trying again ` +
              `${error.attemptNumber} of ${policy.maxAttempts} after ${policy.waitSeconds} seconds...`
          );
        },
      }
    );
  } catch (error) {
    // p-retry reports the most frequent error; the policy promises the last one
    if (error instanceof TransientNetworkError && lastError) {
      throw lastError;
    }
    throw error;
  }
}

/**
 * Binds a retry policy (and optionally a custom sender) for repeated use.
 */
export class RetryingTransport implements HttpTransport {
  readonly policy: RetryPolicy;
  private readonly send: Sender;

  constructor(policy: RetryPolicy, send: Sender = sendRequest) {
    this.policy = policy;
    this.send = send;
  }

  fetch(target: string, options: RequestOptions = {}): Promise<TransportResponse> {
    return fetchWithRetry(target, this.policy, options, this.send);
  }
}
