import type { FollowApi, PageResult } from './types.js';
import { describeError } from './errors.js';

/**
 * Walks `page=1,2,...` until an empty page. A failed page ends the walk and
 * the logins gathered so far are returned, so the result may be incomplete.
 */
export async function fetchAll(api: FollowApi, path: string): Promise<Set<string>> {
  const users = new Set<string>();

  for (let page = 1; ; page++) {
    let result: PageResult;
    try {
      result = await api.listUsers(path, page);
    } catch (error) {
      console.error(`Failed to fetch ${path} (page ${page}): ${describeError(error)}`);
      break;
    }

    if (!result.ok) {
      console.error(`Failed to fetch ${path} (page ${page}): ${result.status} ${result.body}`);
      break;
    }

    if (result.logins.length === 0) break;

    for (const login of result.logins) {
      users.add(login);
    }
  }

  return users;
}

export async function fetchFollowers(api: FollowApi): Promise<Set<string>> {
  console.error('Fetching followers...');
  return fetchAll(api, '/user/followers');
}

export async function fetchFollowing(api: FollowApi): Promise<Set<string>> {
  console.error('Fetching following...');
  return fetchAll(api, '/user/following');
}
