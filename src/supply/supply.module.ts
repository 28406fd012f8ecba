import { Module } from '@nestjs/common';
import { MarketModule } from '../market/market.module';
import { SymbolsModule } from '../symbols/symbols.module';
import { SupplyController } from './supply.controller';
import { SupplyIngestionValidator } from './supply-ingestion.validator';

@Module({
  imports: [MarketModule, SymbolsModule],
  controllers: [SupplyController],
  providers: [SupplyIngestionValidator],
})
export class SupplyModule {}
