import { Injectable } from '@nestjs/common';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { GatewayError } from '../common/errors';
import { LoggerService } from '../logger/logger.service';
import { SymbolNameService } from '../symbols/symbol-name.service';
import { SupplyRequestDto } from './dto/supply-request.dto';
import { DEFAULT_SUPPLY_SOURCE, Supply } from './supply.types';

export const MISSING_SUPPLY_FIELDS_MESSAGE = 'Missing Symbol or CirculatingSupply value';
export const MALFORMED_SUPPLY_MESSAGE = 'Supply body must be a JSON object';

@Injectable()
export class SupplyIngestionValidator {
  constructor(
    private readonly symbolNames: SymbolNameService,
    private readonly logger: LoggerService,
  ) {
    this.logger.setContext('SupplyIngestionValidator');
  }

  /**
   * Turns a raw submission into the record to persist. The timestamp and
   * display name are always assigned here; caller-supplied values for
   * them are ignored.
   */
  validate(raw: unknown): Supply {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      this.logger.error('Rejected supply submission', undefined, { payload: raw });
      throw GatewayError.validation(MALFORMED_SUPPLY_MESSAGE);
    }

    const request = plainToInstance(SupplyRequestDto, raw);
    const violations = validateSync(request);
    if (violations.length > 0) {
      this.logger.error('Rejected supply submission', undefined, {
        payload: raw,
        violations: violations.map((v) => v.property),
      });
      throw GatewayError.validation(MISSING_SUPPLY_FIELDS_MESSAGE);
    }

    this.logger.log('Received supply', { payload: raw });

    return {
      time: new Date().toISOString(),
      name: this.symbolNames.nameForSymbol(request.symbol),
      symbol: request.symbol,
      source: request.source || DEFAULT_SUPPLY_SOURCE,
      circulatingSupply: request.circulatingSupply,
    };
  }
}
