import { Controller, Get, Param, Query } from '@nestjs/common';
import { MarketService } from './market.service';
import { toFilterPointQuery } from './market.params';
import {
  AllExchangesChartPointsParamsDto,
  ChartPointsParamsDto,
  ScaleQueryDto,
  SymbolParamsDto,
} from './dto/market-params.dto';
import { Coins, FilterPoints, Pairs, Quotation, SymbolDetails, Symbols } from './market.types';

@Controller('v1')
export class MarketController {
  constructor(private marketService: MarketService) {}

  @Get('quotation/:symbol')
  getQuotation(@Param() params: SymbolParamsDto): Promise<Quotation> {
    return this.marketService.getQuotation(params.symbol);
  }

  @Get('pairs')
  async getPairs(): Promise<Pairs> {
    return { pairs: await this.marketService.getPairs() };
  }

  @Get('symbol/:symbol')
  getSymbolDetails(@Param() params: SymbolParamsDto): Promise<SymbolDetails> {
    return this.marketService.getSymbolDetails(params.symbol);
  }

  @Get('coins')
  getCoins(): Promise<Coins> {
    return this.marketService.getCoins();
  }

  @Get('chartPoints/:filter/:exchange/:symbol')
  getChartPoints(@Param() params: ChartPointsParamsDto, @Query() query: ScaleQueryDto): Promise<FilterPoints> {
    return this.marketService.getFilterPoints(toFilterPointQuery(params, query.scale));
  }

  @Get('chartPointsAllExchanges/:filter/:symbol')
  getChartPointsAllExchanges(
    @Param() params: AllExchangesChartPointsParamsDto,
    @Query() query: ScaleQueryDto,
  ): Promise<FilterPoints> {
    return this.marketService.getFilterPoints(
      toFilterPointQuery({ filter: params.filter, symbol: params.symbol }, query.scale),
    );
  }

  @Get('symbols')
  async getAllSymbols(): Promise<Symbols> {
    return { symbols: await this.marketService.getAllSymbols() };
  }
}
