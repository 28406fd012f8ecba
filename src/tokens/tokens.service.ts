import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { withDeadline } from '../common/utils/with-deadline';
import { backendTimeoutMs, tokensDegradeOnError } from '../config/gateway.config';
import { SecurityToken, SecurityTokenSymbol } from '../entities/security-token.entity';
import { LoggerService } from '../logger/logger.service';

export interface CountedResult<T> {
  result: T;
  count: number;
}

/**
 * Security-token reference data from the relational store. Queries run on
 * the shared connection pool behind the repository.
 */
@Injectable()
export class TokensService {
  private readonly timeoutMs: number;
  private readonly degradeOnError: boolean;

  constructor(
    @InjectRepository(SecurityToken)
    private tokenRepository: Repository<SecurityToken>,
    configService: ConfigService,
    private logger: LoggerService,
  ) {
    this.logger.setContext('TokensService');
    this.timeoutMs = backendTimeoutMs(configService);
    this.degradeOnError = tokensDegradeOnError(configService);
  }

  async getTokenDetails(tokenSymbol: string): Promise<CountedResult<SecurityToken | null>> {
    try {
      const token = await withDeadline(
        this.tokenRepository.findOne({ where: { tokenSymbol } }),
        this.timeoutMs,
        'reference store getTokenDetails',
      );
      return token ? { result: token, count: 1 } : { result: null, count: 0 };
    } catch (error) {
      return this.degrade(error, 'getTokenDetails', { result: null, count: 0 });
    }
  }

  async getAllTokenSymbols(): Promise<CountedResult<SecurityTokenSymbol[]>> {
    try {
      const tokens = await withDeadline(
        this.tokenRepository.find({
          select: { tokenName: true, tokenSymbol: true },
          order: { tokenSymbol: 'ASC' },
        }),
        this.timeoutMs,
        'reference store getAllTokenSymbols',
      );
      const symbols = tokens.map(({ tokenName, tokenSymbol }) => ({ tokenName, tokenSymbol }));
      return { result: symbols, count: symbols.length };
    } catch (error) {
      return this.degrade(error, 'getAllTokenSymbols', { result: [], count: 0 });
    }
  }

  /**
   * Rethrows unless degraded responses are enabled, in which case the
   * failure is only logged and the empty result is served.
   */
  private degrade<T>(error: unknown, operation: string, fallback: T): T {
    if (!this.degradeOnError) {
      throw error;
    }
    const err = error instanceof Error ? error : new Error(String(error));
    this.logger.error(`Reference store ${operation} failed, serving empty result`, err.stack, {
      error: err.message,
    });
    return fallback;
  }
}
