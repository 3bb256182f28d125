import type { Candidates } from './types.js';

export function difference(from: ReadonlySet<string>, exclude: ReadonlySet<string>): string[] {
  const result: string[] = [];
  for (const login of from) {
    if (!exclude.has(login)) result.push(login);
  }
  // Sorted so that truncation picks the same logins on every run
  return result.sort();
}

export function reconcile(
  followers: ReadonlySet<string>,
  following: ReadonlySet<string>,
  maxFollows: number,
  maxUnfollows: number,
): Candidates {
  return {
    toFollow: difference(followers, following).slice(0, Math.max(maxFollows, 0)),
    toUnfollow: difference(following, followers).slice(0, Math.max(maxUnfollows, 0)),
  };
}
