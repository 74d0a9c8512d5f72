/**
 * Time sources
 *
 * Control logic never reads the wall clock directly: it receives a
 * TimeSource so tests and the simulator can substitute a simulated clock.
 */

/**
 * Current monotonic time in seconds
 * Anchored at the process time origin, never jumps backwards
 */
export function now(): number {
  return (performance.timeOrigin + performance.now()) / 1000;
}

/**
 * Current monotonic time in milliseconds
 */
export function nowMs(): number {
  return performance.timeOrigin + performance.now();
}
