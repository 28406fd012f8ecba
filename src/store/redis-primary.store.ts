import { Inject, Injectable } from '@nestjs/common';
import { Coins, FilterPoint, FilterPoints, FilterPointQuery, Pair, Quotation, SymbolDetails } from '../market/market.types';
import { Supply } from '../supply/supply.types';
import { LoggerService } from '../logger/logger.service';
import { Lookup, PrimaryStore, absent, found } from './primary.store';
import { CHART_POINTS_LIMIT, REDIS_CLIENT, REDIS_KEY_PREFIX, RedisClient } from './redis.client';

function parseJson<T>(raw: string): T {
  return JSON.parse(raw);
}

@Injectable()
export class RedisPrimaryStore extends PrimaryStore {
  constructor(
    @Inject(REDIS_CLIENT) private readonly redis: RedisClient,
    @Inject(REDIS_KEY_PREFIX) private readonly prefix: string,
    @Inject(CHART_POINTS_LIMIT) private readonly chartPointsLimit: number,
    private readonly logger: LoggerService,
  ) {
    super();
    this.logger.setContext('RedisPrimaryStore');
  }

  /**
   * Parts are URI-encoded, so no identifier can contribute a `:` separator.
   */
  key(...parts: string[]): string {
    return `${this.prefix}${parts.map((part) => encodeURIComponent(part)).join(':')}`;
  }

  /**
   * Sorted-set key for a chart series. The all-exchanges series lives under
   * its own key family, which no exchange name can produce.
   */
  filterPointsKey(query: FilterPointQuery): string {
    if (query.exchange === undefined) {
      return this.key('filterPointsAll', query.filter, query.symbol, query.scale);
    }
    return this.key('filterPoints', query.filter, query.exchange, query.symbol, query.scale);
  }

  async getQuotation(symbol: string): Promise<Lookup<Quotation>> {
    return this.lookup<Quotation>(this.key('quotation', symbol));
  }

  async getSupply(symbol: string): Promise<Lookup<Supply>> {
    return this.lookup<Supply>(this.key('supply', symbol));
  }

  async setSupply(supply: Supply): Promise<void> {
    const payload = JSON.stringify(supply);
    const results = await this.redis
      .multi()
      .set(this.key('supply', supply.symbol), payload)
      .zadd(this.key('supply', supply.symbol, 'history'), Date.parse(supply.time), payload)
      .exec();

    if (results === null) {
      throw new Error(`supply transaction for ${supply.symbol} was aborted`);
    }
    for (const [error] of results) {
      if (error) {
        throw error;
      }
    }
    this.logger.debug('Stored supply', { symbol: supply.symbol, source: supply.source });
  }

  async getSymbolDetails(symbol: string): Promise<Lookup<SymbolDetails>> {
    return this.lookup<SymbolDetails>(this.key('symbolDetails', symbol));
  }

  async getPairs(): Promise<Pair[]> {
    const raw = await this.redis.get(this.key('pairs'));
    return raw === null ? [] : parseJson<Pair[]>(raw);
  }

  async getCoins(): Promise<Coins> {
    const raw = await this.redis.get(this.key('coins'));
    if (raw === null) {
      return { completeCoinList: [], coins: [] };
    }
    return parseJson<Coins>(raw);
  }

  async getAllSymbols(): Promise<string[]> {
    const symbols = await this.redis.smembers(this.key('symbols'));
    return symbols.sort();
  }

  async getFilterPoints(query: FilterPointQuery): Promise<FilterPoints> {
    // Most recent N members, still ordered oldest first
    const members = await this.redis.zrange(this.filterPointsKey(query), -this.chartPointsLimit, -1);

    return {
      filter: query.filter,
      exchange: query.exchange ?? null,
      symbol: query.symbol,
      scale: query.scale,
      dataPoints: members.map((member) => parseJson<FilterPoint>(member)),
    };
  }

  async ping(): Promise<void> {
    await this.redis.ping();
  }

  private async lookup<T>(key: string): Promise<Lookup<T>> {
    const raw = await this.redis.get(key);
    if (raw === null) {
      return absent<T>();
    }
    return found(parseJson<T>(raw));
  }
}
