/**
 * Date and timing utilities
 */

import { performance } from "node:perf_hooks";

/**
 * Formats a duration in seconds to a human-readable string
 * @param sec - Duration in seconds
 * @returns Formatted duration string (e.g., "1h30m45s")
 */
export function formatDuration(sec: number): string {
  const s = Math.max(0, Math.floor(sec));
  const h = Math.floor(s / 3600);
  const m = Math.floor((s % 3600) / 60);
  const ss = s % 60;
  return (h ? `${h}h` : "") + (h || m ? `${m}m` : "") + `${ss}s`;
}

/**
 * Seconds elapsed since a `performance.now()` reading, rounded to milliseconds
 */
export function secondsSince(t0: number): number {
  return Math.round(performance.now() - t0) / 1000;
}
