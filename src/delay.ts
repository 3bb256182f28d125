import type { Runtime } from './types.js';

export const systemRuntime: Runtime = {
  now: () => Date.now(),
  sleep: (ms) => new Promise(resolve => setTimeout(resolve, ms)),
  random: () => Math.random(),
};

export function pickDelay(min: number, max: number, random: () => number = Math.random): number {
  return Math.floor(random() * (max - min + 1)) + min;
}

export async function randomDelay(min = 2000, max = 5000, runtime: Runtime = systemRuntime): Promise<void> {
  await runtime.sleep(pickDelay(min, max, () => runtime.random()));
}
