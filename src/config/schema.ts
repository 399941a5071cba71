import { z } from "zod";

/**
 * Default values for a download run.
 */
export const DEFAULT_MAX_ATTEMPTS = 10;
export const DEFAULT_WAIT_SECONDS = 10;
export const DEFAULT_QUALITY = 3200000;

/**
 * Global application configuration schema.
 */
export const configSchema = z.object({
  maxAttempts: z.number().int().min(1).default(DEFAULT_MAX_ATTEMPTS),
  waitSeconds: z.number().int().min(0).default(DEFAULT_WAIT_SECONDS),
  timeLimitSeconds: z.number().min(0).default(0),
  quality: z.number().int().positive().default(DEFAULT_QUALITY),
});

export type Config = z.infer<typeof configSchema>;

/**
 * How often and how patiently a request is retried after a connection error.
 */
export const retryPolicySchema = z.object({
  maxAttempts: z.number().int().min(1),
  waitSeconds: z.number().min(0),
});

export type RetryPolicy = Readonly<z.infer<typeof retryPolicySchema>>;

/**
 * Extracts the retry policy from a configuration.
 */
export function toRetryPolicy(config: Pick<Config, "maxAttempts" | "waitSeconds">): RetryPolicy {
  return Object.freeze(
    retryPolicySchema.parse({ maxAttempts: config.maxAttempts, waitSeconds: config.waitSeconds })
  );
}
