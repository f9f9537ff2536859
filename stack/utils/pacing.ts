/**
 * Clock, sleep and randomness used by every wait, backoff and pointer step.
 * Production code runs on `realPacing`; tests swap in a virtual clock.
 */
export interface Pacing {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
  /** Uniform in [0, 1). */
  random: () => number;
}

export const realPacing: Pacing = {
  now: () => Date.now(),
  sleep: (ms) =>
    new Promise((resolve) => {
      setTimeout(resolve, ms);
    }),
  random: () => Math.random(),
};

export function uniform(pacing: Pacing, low: number, high: number): number {
  return low + (high - low) * pacing.random();
}

/** Inclusive on both ends. */
export function randomInt(pacing: Pacing, low: number, high: number): number {
  return low + Math.floor(pacing.random() * (high - low + 1));
}

export function pick<T>(pacing: Pacing, items: readonly T[]): T | undefined {
  if (items.length === 0) return undefined;
  return items[randomInt(pacing, 0, items.length - 1)];
}
