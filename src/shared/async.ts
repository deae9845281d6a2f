/**
 * Async utilities
 */

export type Sleeper = (ms: number) => Promise<void>;

export const sleep: Sleeper = (ms) => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Seconds, possibly fractional, to whole milliseconds
 */
export const secondsToMs = (seconds: number): number => Math.round(seconds * 1000);
