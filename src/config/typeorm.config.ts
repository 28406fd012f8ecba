import { TypeOrmModuleOptions } from '@nestjs/typeorm';
import { SecurityToken } from '../entities/security-token.entity';

const DEFAULT_TIMEOUT_MS = '5000';

/**
 * Reference store: one shared pool per process. Connections are checked
 * out per query and returned by the driver, never opened per request.
 */
export const typeOrmConfig = (): TypeOrmModuleOptions => {
  const databaseUrl = process.env.DATABASE_URL;
  const timeoutMs = parseInt(process.env.BACKEND_TIMEOUT_MS || DEFAULT_TIMEOUT_MS, 10);
  const pool = {
    max: parseInt(process.env.DB_POOL_SIZE || '10', 10),
    connectionTimeoutMillis: timeoutMs,
    statement_timeout: timeoutMs,
  };

  if (databaseUrl) {
    return {
      type: 'postgres',
      url: databaseUrl,
      entities: [SecurityToken],
      synchronize: false,
      logging: process.env.NODE_ENV === 'development',
      extra: pool,
    };
  }

  return {
    type: 'postgres',
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    username: process.env.DB_USERNAME || 'postgres',
    password: process.env.DB_PASSWORD || 'postgres',
    database: process.env.DB_DATABASE || 'reference',
    entities: [SecurityToken],
    synchronize: false,
    logging: process.env.NODE_ENV === 'development',
    extra: pool,
  };
};
