import { setTimeout as delay } from "node:timers/promises";

export interface Clock {
  now(): number;
  // Rejects with an AbortError when the signal fires mid-sleep.
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms, signal) => {
    await delay(ms, undefined, { signal });
  },
};
