import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { LoggerModule } from './logger/logger.module';
import { StoreModule } from './store/store.module';
import { MarketModule } from './market/market.module';
import { SupplyModule } from './supply/supply.module';
import { TokensModule } from './tokens/tokens.module';
import { HealthModule } from './health/health.module';
import { typeOrmConfig } from './config/typeorm.config';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
    }),
    TypeOrmModule.forRootAsync({
      useFactory: () => typeOrmConfig(),
    }),
    LoggerModule,
    StoreModule,
    MarketModule,
    SupplyModule,
    TokensModule,
    HealthModule,
  ],
})
export class AppModule {}
