export const DEFAULT_SUPPLY_SOURCE = 'market-data-gateway';

export interface Supply {
  symbol: string;
  name: string;
  source: string;
  circulatingSupply: number;
  time: string;
}
