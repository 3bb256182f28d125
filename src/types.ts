export type SyncMode = 'dry-run' | 'execute';

export interface RunConfig {
  readonly mode: SyncMode;
  readonly maxFollows: number;
  readonly maxUnfollows: number;
}

export interface ApiConfig {
  readonly token: string;
  readonly baseUrl: string;
}

export interface RateLimit {
  remaining: number;
  /** Epoch seconds at which the quota resets. */
  reset: number;
}

export type PageResult =
  | { ok: true; logins: string[] }
  | { ok: false; status: number; body: string };

export interface FollowApi {
  getRateLimit(): Promise<RateLimit>;
  listUsers(path: string, page: number): Promise<PageResult>;
  follow(username: string): Promise<number>;
  unfollow(username: string): Promise<number>;
}

export interface Runtime {
  now(): number;
  sleep(ms: number): Promise<void>;
  random(): number;
}

export interface Candidates {
  toFollow: string[];
  toUnfollow: string[];
}

export interface ActionResult {
  username: string;
  action: 'follow' | 'unfollow';
  ok: boolean;
  status: number;
}

export interface SyncSummary extends Candidates {
  followers: number;
  following: number;
  results: ActionResult[];
}
