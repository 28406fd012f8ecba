import { GatewayError } from '../errors';

export const SCALES = ['5m', '30m', '1h', '4h', '1d', '1w'] as const;

export type Scale = (typeof SCALES)[number];

export const DEFAULT_SCALE: Scale = '5m';

export function isScale(value: string): value is Scale {
  return SCALES.some((scale) => scale === value);
}

/**
 * Resolves the chart bucket width. An omitted or empty token means the
 * default bucket; anything else must match the enumeration exactly.
 */
export function resolveScale(raw?: string): Scale {
  if (raw === undefined || raw === '') {
    return DEFAULT_SCALE;
  }
  if (!isScale(raw)) {
    throw GatewayError.validation(`invalid scale "${raw}", expected one of ${SCALES.join(', ')}`);
  }
  return raw;
}
