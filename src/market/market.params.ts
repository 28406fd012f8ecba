import { resolveScale } from '../common/scale/time-bucket';
import { FilterPointQuery } from './market.types';

/**
 * Optional dimensions use the empty string as "absent".
 */
export function normalizeExchange(raw?: string): string | undefined {
  return raw === undefined || raw === '' ? undefined : raw;
}

export function toFilterPointQuery(
  params: { filter: string; symbol: string; exchange?: string },
  rawScale?: string,
): FilterPointQuery {
  return {
    filter: params.filter,
    exchange: normalizeExchange(params.exchange),
    symbol: params.symbol,
    scale: resolveScale(rawScale),
  };
}
