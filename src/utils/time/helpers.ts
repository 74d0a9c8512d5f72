/**
 * Time helper functions
 */

/**
 * Seconds elapsed since a timestamp
 * @param nowSec - Current timestamp (s)
 * @param sinceSec - Earlier timestamp (s), null when unknown
 * @returns Elapsed seconds, 0 when unknown or when the clock went backwards
 */
export function elapsedSec(nowSec: number, sinceSec: number | null): number {
  if (sinceSec === null) {
    return 0;
  }

  const dt = nowSec - sinceSec;
  return dt > 0 ? dt : 0;
}

/**
 * Format a duration for log lines
 * @param seconds - Duration in seconds
 * @returns e.g. "45s", "2m05s", "1h03m"
 */
export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.round(seconds));
  if (total < 60) {
    return total + "s";
  }

  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;

  if (hours > 0) {
    return hours + "h" + (minutes < 10 ? "0" : "") + minutes + "m";
  }
  return minutes + "m" + (secs < 10 ? "0" : "") + secs + "s";
}
