import { ConfigError, TimeoutError } from "../errors.js";

/** Largest budget a single timer can hold (2^31 - 1 ms, rounded down to whole seconds). */
export const MAX_TIMEOUT_SECONDS = 2_147_483;

export function isValidTimeout(timeoutSeconds: number): boolean {
  return Number.isInteger(timeoutSeconds) && timeoutSeconds > 0 && timeoutSeconds <= MAX_TIMEOUT_SECONDS;
}

export function invalidTimeout(timeoutSeconds: number, agentName?: string): ConfigError {
  const subject = agentName !== undefined ? `Invalid timeout for agent "${agentName}"` : "Invalid timeout";
  return new ConfigError(
    "INVALID_CONFIG",
    `${subject}: ${timeoutSeconds} (must be an integer from 1 to ${MAX_TIMEOUT_SECONDS} seconds)`,
  );
}

/**
 * Race `work` against a timer. On expiry the returned promise rejects with a TimeoutError;
 * `work` itself keeps running, only the wait ends.
 */
export function withTimeout<T>(work: Promise<T>, timeoutSeconds: number): Promise<T> {
  if (!isValidTimeout(timeoutSeconds)) return Promise.reject(invalidTimeout(timeoutSeconds));

  let timer: ReturnType<typeof setTimeout> | undefined;
  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(timeoutSeconds)), timeoutSeconds * 1000);
  });
  return Promise.race([work, expiry]).finally(() => clearTimeout(timer));
}
