/**
 * Commands queued inside MULTI. `exec` yields one `[error, result]` entry
 * per command, or null when the transaction was discarded.
 */
export interface RedisTransaction {
  set(key: string, value: string): RedisTransaction;
  zadd(key: string, score: number, member: string): RedisTransaction;
  exec(): Promise<Array<[Error | null, unknown]> | null>;
}

/**
 * The subset of ioredis commands the primary store issues. An ioredis
 * `Redis` instance satisfies it; tests supply an in-memory double.
 */
export interface RedisClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  smembers(key: string): Promise<string[]>;
  zadd(key: string, score: number, member: string): Promise<unknown>;
  zrange(key: string, start: number, stop: number): Promise<string[]>;
  multi(): RedisTransaction;
  ping(): Promise<string>;
  quit(): Promise<unknown>;
}

export const REDIS_CLIENT = 'REDIS_CLIENT';
export const REDIS_KEY_PREFIX = 'REDIS_KEY_PREFIX';
export const CHART_POINTS_LIMIT = 'CHART_POINTS_LIMIT';
