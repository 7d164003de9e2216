import { setTimeout as delay } from "node:timers/promises";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export function exponentialBackoffMs(baseDelayMs: number, attemptIndex: number) {
  return baseDelayMs * 2 ** Math.max(0, attemptIndex);
}

export function withJitter(
  delayMs: number,
  jitterRatio: number,
  random: () => number,
) {
  return Math.round(delayMs + delayMs * jitterRatio * random());
}
