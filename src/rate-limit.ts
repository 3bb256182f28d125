import type { FollowApi, Runtime } from './types.js';
import { systemRuntime } from './delay.js';

export const MIN_REMAINING = 5;

export function secondsUntilReset(reset: number, nowMs: number): number {
  return Math.max(reset - Math.floor(nowMs / 1000), 0);
}

/**
 * Sleeps until the quota resets when fewer than {@link MIN_REMAINING} calls
 * are left. Failures of the check itself are fatal and propagate.
 */
export async function checkRateLimit(api: FollowApi, runtime: Runtime = systemRuntime): Promise<void> {
  const { remaining, reset } = await api.getRateLimit();
  console.error(`API remaining: ${remaining}`);

  if (remaining < MIN_REMAINING) {
    const waitSeconds = secondsUntilReset(reset, runtime.now());
    console.error(`Rate limit low. Sleeping ${waitSeconds} seconds...`);
    await runtime.sleep(waitSeconds * 1000);
  }
}
