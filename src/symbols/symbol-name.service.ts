import { Injectable } from '@nestjs/common';
import symbolNames from './symbol-names.json';

const NAMES = new Map<string, string>(Object.entries(symbolNames));

/**
 * Display names for ticker symbols. Unknown symbols are their own name.
 */
@Injectable()
export class SymbolNameService {
  nameForSymbol(symbol: string): string {
    return NAMES.get(symbol) ?? symbol;
  }
}
