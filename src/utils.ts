/** Timing helpers */

export const delay = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

export const randomBetween = (min: number, max: number, random: () => number = Math.random): number =>
  Math.floor(random() * (max - min + 1)) + min;

export type Jitter = () => Promise<void>;

/** Random pause in [minMs, maxMs]; a zero upper bound disables it entirely. */
export function createJitter(minMs: number, maxMs: number, random: () => number = Math.random): Jitter {
  if (maxMs <= 0) return async () => {};
  return () => delay(randomBetween(minMs, maxMs, random));
}
