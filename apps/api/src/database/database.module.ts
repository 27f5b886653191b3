import { Global, Inject, Logger, Module, OnApplicationShutdown } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Pool, type PoolConfig } from 'pg';
import type { AppConfig } from '../config/configuration';
import { QUOTE_STORE } from '../quotes/types';
import { PG_POOL, PROBE_TIMEOUT_MS } from './database.constants';
import { MigrationRunner } from './migrations';
import { PgQuoteStore } from './quote.store';

function sslOption(mode: AppConfig['database']['sslMode']): PoolConfig['ssl'] {
  if (mode === 'disable') return false;
  if (mode === 'require') return { rejectUnauthorized: false };
  return { rejectUnauthorized: true };
}

export function poolConfig(db: AppConfig['database']): PoolConfig {
  return {
    host: db.host,
    port: db.port,
    user: db.user,
    password: db.password,
    database: db.name,
    ssl: sslOption(db.sslMode),
    connectionTimeoutMillis: PROBE_TIMEOUT_MS,
  };
}

const poolFactory = {
  provide: PG_POOL,
  inject: [ConfigService],
  useFactory: (cfg: ConfigService<AppConfig, true>) => {
    const logger = new Logger('PgPool');
    const pool = new Pool(poolConfig(cfg.get('database', { infer: true })));
    // 유휴 커넥션 에러를 처리하지 않으면 프로세스가 죽음
    pool.on('error', (err) => logger.error(`Idle client error: ${err.message}`));
    return pool;
  },
};

@Global()
@Module({
  providers: [
    poolFactory,
    PgQuoteStore,
    { provide: QUOTE_STORE, useExisting: PgQuoteStore },
    MigrationRunner,
  ],
  exports: [PG_POOL, QUOTE_STORE],
})
export class DatabaseModule implements OnApplicationShutdown {
  private readonly logger = new Logger(DatabaseModule.name);

  constructor(@Inject(PG_POOL) private readonly pool: Pick<Pool, 'end'>) {}

  async onApplicationShutdown(): Promise<void> {
    await this.pool.end();
    this.logger.log('Database pool closed');
  }
}
