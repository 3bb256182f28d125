import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import type { FollowApi, PageResult } from './types.js';
import { fetchAll, fetchFollowers } from './fetcher.js';

function makeApi(listUsers: FollowApi['listUsers']): FollowApi {
  return {
    getRateLimit: vi.fn().mockResolvedValue({ remaining: 5000, reset: 0 }),
    listUsers,
    follow: vi.fn().mockResolvedValue(204),
    unfollow: vi.fn().mockResolvedValue(204),
  };
}

function page(...logins: string[]): PageResult {
  return { ok: true, logins };
}

describe('fetchAll', () => {
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('stops at the first empty page', async () => {
    const listUsers = vi.fn<FollowApi['listUsers']>()
      .mockResolvedValueOnce(page('A', 'B'))
      .mockResolvedValueOnce(page('C'))
      .mockResolvedValueOnce(page());

    const users = await fetchAll(makeApi(listUsers), '/user/followers');

    expect(users).toEqual(new Set(['A', 'B', 'C']));
    expect(listUsers.mock.calls).toEqual([
      ['/user/followers', 1],
      ['/user/followers', 2],
      ['/user/followers', 3],
    ]);
    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('returns the partial set and logs when a page fails', async () => {
    const listUsers = vi.fn<FollowApi['listUsers']>()
      .mockResolvedValueOnce(page('A'))
      .mockResolvedValueOnce({ ok: false, status: 500, body: 'Server Error' });

    const users = await fetchAll(makeApi(listUsers), '/user/following');

    expect(users).toEqual(new Set(['A']));
    expect(listUsers).toHaveBeenCalledTimes(2);
    expect(errorSpy).toHaveBeenCalledWith('Failed to fetch /user/following (page 2): 500 Server Error');
  });

  it('treats a transport error as the end of the list', async () => {
    const listUsers = vi.fn<FollowApi['listUsers']>()
      .mockResolvedValueOnce(page('A', 'B'))
      .mockRejectedValueOnce(new Error('socket hang up'));

    const users = await fetchAll(makeApi(listUsers), '/user/followers');

    expect(users).toEqual(new Set(['A', 'B']));
    expect(errorSpy).toHaveBeenCalledWith('Failed to fetch /user/followers (page 2): socket hang up');
  });

  it('collapses logins repeated across pages', async () => {
    const listUsers = vi.fn<FollowApi['listUsers']>()
      .mockResolvedValueOnce(page('A', 'B'))
      .mockResolvedValueOnce(page('B', 'C'))
      .mockResolvedValueOnce(page());

    const users = await fetchAll(makeApi(listUsers), '/user/followers');
    expect(users.size).toBe(3);
  });

  it('fetches followers from the followers endpoint', async () => {
    const listUsers = vi.fn<FollowApi['listUsers']>().mockResolvedValue(page());

    await fetchFollowers(makeApi(listUsers));

    expect(listUsers).toHaveBeenCalledWith('/user/followers', 1);
    expect(errorSpy).toHaveBeenCalledWith('Fetching followers...');
  });
});
