import { Coins, FilterPoints, FilterPointQuery, Pair, Quotation, SymbolDetails } from '../market/market.types';
import { Supply } from '../supply/supply.types';

/**
 * Outcome of a keyed lookup. Absence is a value, not an error; backend
 * failures reject the returned promise.
 */
export type Lookup<T> = { kind: 'found'; value: T } | { kind: 'absent' };

export const found = <T>(value: T): Lookup<T> => ({ kind: 'found', value });
export const absent = <T>(): Lookup<T> => ({ kind: 'absent' });

/**
 * Primary key-value / time-series store. Used as the injection token.
 */
export abstract class PrimaryStore {
  abstract getQuotation(symbol: string): Promise<Lookup<Quotation>>;
  abstract getSupply(symbol: string): Promise<Lookup<Supply>>;
  abstract setSupply(supply: Supply): Promise<void>;
  abstract getSymbolDetails(symbol: string): Promise<Lookup<SymbolDetails>>;
  abstract getPairs(): Promise<Pair[]>;
  abstract getCoins(): Promise<Coins>;
  abstract getAllSymbols(): Promise<string[]>;
  abstract getFilterPoints(query: FilterPointQuery): Promise<FilterPoints>;
  abstract ping(): Promise<void>;
}
