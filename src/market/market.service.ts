import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { GatewayError } from '../common/errors';
import { withDeadline } from '../common/utils/with-deadline';
import { backendTimeoutMs } from '../config/gateway.config';
import { LoggerService } from '../logger/logger.service';
import { Lookup, PrimaryStore } from '../store/primary.store';
import { Supply } from '../supply/supply.types';
import { Coins, FilterPointQuery, FilterPoints, Pair, Quotation, SymbolDetails } from './market.types';

export const NO_SYMBOLS_MESSAGE = 'cant find symbols';

/**
 * Dispatches market-data reads and supply writes to the primary store.
 * One store call per operation, bounded by the backend deadline, never
 * retried.
 */
@Injectable()
export class MarketService {
  private readonly timeoutMs: number;

  constructor(
    private readonly store: PrimaryStore,
    configService: ConfigService,
    private readonly logger: LoggerService,
  ) {
    this.logger.setContext('MarketService');
    this.timeoutMs = backendTimeoutMs(configService);
  }

  async getQuotation(symbol: string): Promise<Quotation> {
    const quotation = await this.call('getQuotation', this.store.getQuotation(symbol));
    return this.require(quotation, `Quotation for ${symbol} not found`);
  }

  async getSupply(symbol: string): Promise<Supply> {
    const supply = await this.call('getSupply', this.store.getSupply(symbol));
    return this.require(supply, `Supply for ${symbol} not found`);
  }

  async setSupply(supply: Supply): Promise<void> {
    await this.call('setSupply', this.store.setSupply(supply));
  }

  async getSymbolDetails(symbol: string): Promise<SymbolDetails> {
    const details = await this.call('getSymbolDetails', this.store.getSymbolDetails(symbol));
    return this.require(details, `Symbol ${symbol} not found`);
  }

  async getPairs(): Promise<Pair[]> {
    return this.call('getPairs', this.store.getPairs());
  }

  async getCoins(): Promise<Coins> {
    return this.call('getCoins', this.store.getCoins());
  }

  /**
   * Unlike the other lists, an empty symbol list means the store is not
   * populated and is reported as an internal error.
   */
  async getAllSymbols(): Promise<string[]> {
    const symbols = await this.call('getAllSymbols', this.store.getAllSymbols());
    if (symbols.length === 0) {
      throw GatewayError.internal(NO_SYMBOLS_MESSAGE);
    }
    return symbols;
  }

  async getFilterPoints(query: FilterPointQuery): Promise<FilterPoints> {
    this.logger.debug('Chart points query', {
      filter: query.filter,
      exchange: query.exchange ?? 'all',
      symbol: query.symbol,
      scale: query.scale,
    });
    return this.call('getFilterPoints', this.store.getFilterPoints(query));
  }

  private call<T>(operation: string, pending: Promise<T>): Promise<T> {
    return withDeadline(pending, this.timeoutMs, `primary store ${operation}`);
  }

  private require<T>(lookup: Lookup<T>, notFoundMessage: string): T {
    if (lookup.kind === 'absent') {
      throw GatewayError.notFound(notFoundMessage);
    }
    return lookup.value;
  }
}
