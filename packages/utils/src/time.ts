/**
 * Time Utilities
 */

/**
 * Format duration in milliseconds to human-readable string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  
  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  }
  if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  }
  return `${seconds}s`;
}

/**
 * Delay for the given attempt of an exponential ladder, capped at maxDelay.
 * Attempt 0 yields the initial delay.
 */
export function backoffDelay(
  attempt: number,
  initialDelay: number,
  maxDelay: number,
  multiplier = 2
): number {
  const delay = initialDelay * Math.pow(multiplier, Math.max(0, attempt));
  return Math.min(delay, maxDelay);
}
