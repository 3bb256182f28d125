import type { ActionResult, Candidates, FollowApi, Runtime, SyncMode } from './types.js';
import { randomDelay, systemRuntime } from './delay.js';

export const ACTION_DELAY_MIN_MS = 2000;
export const ACTION_DELAY_MAX_MS = 5000;

const SUCCESS_STATUS = 204;

interface ActionStep {
  progress: string;
  done: string;
  call: (api: FollowApi, username: string) => Promise<number>;
}

const ACTIONS = {
  follow: {
    progress: 'Following',
    done: 'Followed',
    call: (api, username) => api.follow(username),
  },
  unfollow: {
    progress: 'Unfollowing',
    done: 'Unfollowed',
    call: (api, username) => api.unfollow(username),
  },
} satisfies Record<ActionResult['action'], ActionStep>;

export function formatCandidates(label: string, users: readonly string[]): string {
  return `${label}: ${users.length > 0 ? users.join(', ') : '(none)'}`;
}

export function reportDryRun({ toFollow, toUnfollow }: Candidates): void {
  console.log(formatCandidates('Would follow', toFollow));
  console.log(formatCandidates('Would unfollow', toUnfollow));
}

async function performAll(
  api: FollowApi,
  action: ActionResult['action'],
  users: readonly string[],
  runtime: Runtime,
): Promise<ActionResult[]> {
  const step = ACTIONS[action];
  const results: ActionResult[] = [];

  for (const username of users) {
    console.error(`${step.progress} ${username}`);
    const status = await step.call(api, username);
    const ok = status === SUCCESS_STATUS;
    if (ok) {
      console.error(`${step.done} ${username}`);
    }
    results.push({ username, action, ok, status });

    await randomDelay(ACTION_DELAY_MIN_MS, ACTION_DELAY_MAX_MS, runtime);
  }

  return results;
}

/**
 * In dry-run mode only prints the candidates. In execute mode follows, then
 * unfollows, one login at a time with a random pause after every call.
 */
export async function execute(
  api: FollowApi,
  toFollow: readonly string[],
  toUnfollow: readonly string[],
  mode: SyncMode,
  runtime: Runtime = systemRuntime,
): Promise<ActionResult[]> {
  if (mode === 'dry-run') {
    reportDryRun({ toFollow: [...toFollow], toUnfollow: [...toUnfollow] });
    return [];
  }

  const followed = await performAll(api, 'follow', toFollow, runtime);
  const unfollowed = await performAll(api, 'unfollow', toUnfollow, runtime);
  return [...followed, ...unfollowed];
}
