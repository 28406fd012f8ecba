import { ConfigService } from '@nestjs/config';

export const DEFAULT_BACKEND_TIMEOUT_MS = 5000;
export const DEFAULT_CHART_POINTS_LIMIT = 1000;

function positiveInt(config: ConfigService, name: string, fallback: number): number {
  const value = parseInt(config.get<string>(name) || '', 10);
  return Number.isFinite(value) && value > 0 ? value : fallback;
}

/**
 * Upper bound for a single backing-store call, in milliseconds.
 */
export function backendTimeoutMs(config: ConfigService): number {
  return positiveInt(config, 'BACKEND_TIMEOUT_MS', DEFAULT_BACKEND_TIMEOUT_MS);
}

/**
 * Most recent points returned per chart query.
 */
export function chartPointsLimit(config: ConfigService): number {
  return positiveInt(config, 'CHART_POINTS_LIMIT', DEFAULT_CHART_POINTS_LIMIT);
}

export function tokensDegradeOnError(config: ConfigService): boolean {
  return config.get<string>('TOKENS_DEGRADE_ON_ERROR') === 'true';
}
