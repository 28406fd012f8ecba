import { Body, Controller, Get, HttpCode, HttpStatus, Param, Post } from '@nestjs/common';
import { MarketService } from '../market/market.service';
import { SymbolParamsDto } from '../market/dto/market-params.dto';
import { SupplyIngestionValidator } from './supply-ingestion.validator';
import { Supply } from './supply.types';

@Controller('v1/supply')
export class SupplyController {
  constructor(
    private marketService: MarketService,
    private validator: SupplyIngestionValidator,
  ) {}

  // Body stays untyped so the global pipe leaves it to the ingestion validator
  @Post()
  @HttpCode(HttpStatus.OK)
  async postSupply(@Body() body: unknown): Promise<Supply> {
    const supply = this.validator.validate(body);
    await this.marketService.setSupply(supply);
    return supply;
  }

  @Get(':symbol')
  getSupply(@Param() params: SymbolParamsDto): Promise<Supply> {
    return this.marketService.getSupply(params.symbol);
  }
}
