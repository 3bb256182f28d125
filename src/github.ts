import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { RateLimitCheckError } from './errors.js';
import type { ApiConfig, FollowApi, PageResult, RateLimit } from './types.js';

export const PAGE_SIZE = 100;

const RateLimitResponseSchema = z.object({
  rate: z.object({
    remaining: z.number(),
    reset: z.number(),
  }),
});

const UserPageSchema = z.array(z.object({ login: z.string() }));

export function createHttpClient(config: ApiConfig): AxiosInstance {
  return axios.create({
    baseURL: config.baseUrl,
    timeout: 30_000,
    headers: {
      Authorization: `Bearer ${config.token}`,
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
    },
    // Status codes are interpreted by the callers, never thrown.
    validateStatus: () => true,
  });
}

function describeBody(data: unknown): string {
  if (data === undefined || data === null) return '';
  return typeof data === 'string' ? data : JSON.stringify(data);
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export class GitHubClient implements FollowApi {
  constructor(private readonly http: AxiosInstance) {}

  static fromConfig(config: ApiConfig): GitHubClient {
    return new GitHubClient(createHttpClient(config));
  }

  async getRateLimit(): Promise<RateLimit> {
    const res = await this.http.get<unknown>('/rate_limit');
    if (!isSuccess(res.status)) {
      throw new RateLimitCheckError(
        `Rate limit check failed (${res.status}): ${describeBody(res.data)}`,
        res.status,
      );
    }

    const parsed = RateLimitResponseSchema.safeParse(res.data);
    if (!parsed.success) {
      throw new RateLimitCheckError('Rate limit response is missing rate.remaining or rate.reset', res.status);
    }
    return parsed.data.rate;
  }

  async listUsers(path: string, page: number): Promise<PageResult> {
    const res = await this.http.get<unknown>(path, {
      params: { per_page: PAGE_SIZE, page },
    });
    if (res.status !== 200) {
      return { ok: false, status: res.status, body: describeBody(res.data) };
    }

    const parsed = UserPageSchema.safeParse(res.data);
    if (!parsed.success) {
      return { ok: false, status: res.status, body: `unexpected page body: ${describeBody(res.data)}` };
    }
    return { ok: true, logins: parsed.data.map(user => user.login) };
  }

  async follow(username: string): Promise<number> {
    const res = await this.http.put(`/user/following/${encodeURIComponent(username)}`);
    return res.status;
  }

  async unfollow(username: string): Promise<number> {
    const res = await this.http.delete(`/user/following/${encodeURIComponent(username)}`);
    return res.status;
  }
}
