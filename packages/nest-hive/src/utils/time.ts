/** Returns current timestamp in milliseconds. */
export function nowMs(): number {
  return Date.now();
}

/** Drops the sub-second part of a millisecond timestamp (`1700000000999` -> `1700000000000`). */
export function truncateToSecondMs(ms: number): number {
  return Math.floor(ms / 1000) * 1000;
}
