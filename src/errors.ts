export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class RateLimitCheckError extends Error {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'RateLimitCheckError';
    this.status = status;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
