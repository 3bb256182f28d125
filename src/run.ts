import type { FollowApi, RunConfig, Runtime, SyncSummary } from './types.js';
import { systemRuntime } from './delay.js';
import { checkRateLimit } from './rate-limit.js';
import { fetchFollowers, fetchFollowing } from './fetcher.js';
import { reconcile } from './reconciler.js';
import { execute } from './executor.js';

export async function runSync(
  api: FollowApi,
  config: RunConfig,
  runtime: Runtime = systemRuntime,
): Promise<SyncSummary> {
  await checkRateLimit(api, runtime);

  const followers = await fetchFollowers(api);
  const following = await fetchFollowing(api);

  const { toFollow, toUnfollow } = reconcile(followers, following, config.maxFollows, config.maxUnfollows);
  console.error(`Users to follow: ${toFollow.length}`);
  console.error(`Users to unfollow: ${toUnfollow.length}`);

  const results = await execute(api, toFollow, toUnfollow, config.mode, runtime);

  return {
    followers: followers.size,
    following: following.size,
    toFollow,
    toUnfollow,
    results,
  };
}

export function formatSummary(summary: SyncSummary, config: RunConfig): string {
  if (config.mode === 'dry-run') {
    return `Done! Dry run, nothing changed (${summary.followers} followers, ${summary.following} following).`;
  }

  const succeeded = (action: 'follow' | 'unfollow') =>
    summary.results.filter(result => result.action === action && result.ok).length;

  return `Done! Followed ${succeeded('follow')}/${summary.toFollow.length}, unfollowed ${succeeded('unfollow')}/${summary.toUnfollow.length}.`;
}
