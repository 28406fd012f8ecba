import { Module } from '@nestjs/common';
import { SymbolNameService } from './symbol-name.service';

@Module({
  providers: [SymbolNameService],
  exports: [SymbolNameService],
})
export class SymbolsModule {}
