/**
 * Utility function to create a delay/sleep in async code
 * @param ms - Milliseconds to wait
 * @returns Promise that resolves after the specified time
 *
 * @example
 * await delay(1000); // Wait 1 second
 */
export const delay = (ms: number): Promise<void> => {
  return new Promise((resolve) => setTimeout(resolve, ms));
};

/**
 * Exponential backoff delay in milliseconds (no waiting)
 * @param attempt - Current attempt number (0-indexed)
 * @param baseDelayMs - Base delay in milliseconds
 * @param maxDelayMs - Maximum delay cap in milliseconds
 *
 * @example
 * backoffDelayMs(0, 1000); // 1000
 * backoffDelayMs(3, 1000); // 8000
 */
export const backoffDelayMs = (
  attempt: number,
  baseDelayMs: number = 1000,
  maxDelayMs: number = 30000,
): number => {
  return Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
};

/**
 * Adds jitter (randomness) to a delay to prevent thundering herd problem
 * @param baseDelayMs - Base delay in milliseconds
 * @param jitterPercent - Percentage of jitter (0-100), default 20%
 * @returns Delay with jitter applied
 */
export const delayWithJitter = (
  baseDelayMs: number,
  jitterPercent: number = 20,
): Promise<void> => {
  const jitter = (baseDelayMs * jitterPercent) / 100;
  const randomJitter = Math.random() * jitter * 2 - jitter;
  const delayMs = Math.max(0, baseDelayMs + randomJitter);
  return delay(delayMs);
};

/**
 * Parse a Retry-After header value
 * @param retryAfter - Seconds (number or numeric string) or an HTTP date
 * @returns Milliseconds to wait, or null when the header is absent or unreadable
 */
export const parseRetryAfter = (
  retryAfter: string | number | undefined | null,
): number | null => {
  if (retryAfter === undefined || retryAfter === null || retryAfter === '') {
    return null;
  }

  if (typeof retryAfter === 'number') {
    return Math.max(0, retryAfter * 1000);
  }

  const seconds = Number.parseInt(retryAfter, 10);
  if (!Number.isNaN(seconds)) {
    return Math.max(0, seconds * 1000);
  }

  const retryDate = new Date(retryAfter);
  if (!Number.isNaN(retryDate.getTime())) {
    return Math.max(0, retryDate.getTime() - Date.now());
  }

  return null;
};
