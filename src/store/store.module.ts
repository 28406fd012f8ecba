import { Global, Inject, Module, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { PrimaryStore } from './primary.store';
import { RedisPrimaryStore } from './redis-primary.store';
import { CHART_POINTS_LIMIT, REDIS_CLIENT, REDIS_KEY_PREFIX, RedisClient } from './redis.client';
import { backendTimeoutMs, chartPointsLimit } from '../config/gateway.config';

@Global()
@Module({
  providers: [
    {
      provide: REDIS_CLIENT,
      inject: [ConfigService],
      useFactory: (config: ConfigService): RedisClient =>
        new Redis({
          host: config.get<string>('REDIS_HOST') || 'localhost',
          port: parseInt(config.get<string>('REDIS_PORT') || '6379', 10),
          password: config.get<string>('REDIS_PASSWORD') || undefined,
          db: parseInt(config.get<string>('REDIS_DB') || '0', 10),
          commandTimeout: backendTimeoutMs(config),
          maxRetriesPerRequest: 1,
        }),
    },
    {
      provide: REDIS_KEY_PREFIX,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => config.get<string>('REDIS_KEY_PREFIX') ?? 'gateway:',
    },
    {
      provide: CHART_POINTS_LIMIT,
      inject: [ConfigService],
      useFactory: (config: ConfigService) => chartPointsLimit(config),
    },
    {
      provide: PrimaryStore,
      useClass: RedisPrimaryStore,
    },
  ],
  exports: [PrimaryStore],
})
export class StoreModule implements OnApplicationShutdown {
  constructor(@Inject(REDIS_CLIENT) private readonly redis: RedisClient) {}

  async onApplicationShutdown() {
    await this.redis.quit();
  }
}
