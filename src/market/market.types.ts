import { Scale } from '../common/scale/time-bucket';

export interface Quotation {
  symbol: string;
  name: string;
  price: number;
  priceYesterday?: number;
  volumeYesterdayUSD?: number;
  source: string;
  time: string;
  iTIN?: string;
}

export interface Pair {
  symbol: string;
  foreignName: string;
  exchange: string;
  ignore?: boolean;
}

export interface Pairs {
  pairs: Pair[];
}

export interface Coin {
  symbol: string;
  name: string;
  price: number;
  priceYesterday?: number;
  volumeYesterdayUSD?: number;
  time: string;
  circulatingSupply?: number;
}

export interface CoinSymbolAndName {
  symbol: string;
  name: string;
}

export interface Coins {
  completeCoinList: CoinSymbolAndName[];
  change?: Record<string, number>;
  coins: Coin[];
}

export interface SymbolDetails {
  coin: Coin;
  rank: number;
  change?: Record<string, number>;
  exchanges: Array<{ name: string; price: number; volumeYesterdayUSD?: number; time: string }>;
  gfx?: {
    points: FilterPoint[];
  };
}

export interface Symbols {
  symbols: string[];
}

export interface FilterPoint {
  time: string;
  value: number;
}

/**
 * Canonical chart query. `exchange` undefined means all exchanges.
 */
export interface FilterPointQuery {
  filter: string;
  exchange?: string;
  symbol: string;
  scale: Scale;
}

export interface FilterPoints {
  filter: string;
  exchange: string | null;
  symbol: string;
  scale: Scale;
  dataPoints: FilterPoint[];
}
