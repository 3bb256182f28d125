import { ConfigError } from './errors.js';
import type { ApiConfig } from './types.js';

export const DEFAULT_API_URL = 'https://api.github.com';

export function resolveApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const token = env.GITHUB_TOKEN?.trim();
  if (!token) {
    throw new ConfigError('GITHUB_TOKEN not set');
  }

  const baseUrl = (env.GITHUB_API_URL?.trim() || DEFAULT_API_URL).replace(/\/+$/, '');
  return { token, baseUrl };
}
