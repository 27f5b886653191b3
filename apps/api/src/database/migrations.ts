import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import type { AppConfig } from '../config/configuration';
import { errorMessage } from '../common/errors';
import { PG_POOL } from './database.constants';
import type { Queryable } from './quote.store';

export interface MigrationClient extends Queryable {
  release(): void;
}

export interface MigrationPool {
  connect(): Promise<MigrationClient>;
}

export class MigrationError extends Error {
  constructor(readonly version: string, options: { cause: unknown }) {
    super(`migration ${version} failed: ${errorMessage(options.cause)}`, options);
    this.name = 'MigrationError';
  }
}

// 여러 인스턴스가 동시에 떠도 마이그레이션은 한 번만 돌도록 잠금
const LOCK_KEY = 727_001;

/** migrations/*.up.sql 을 파일명 순서대로, 파일마다 트랜잭션 하나로 적용 */
@Injectable()
export class MigrationRunner implements OnModuleInit {
  private readonly logger = new Logger(MigrationRunner.name);

  constructor(
    @Inject(PG_POOL) private readonly pool: MigrationPool,
    private readonly cfg: ConfigService<AppConfig, true>,
  ) {}

  async onModuleInit(): Promise<void> {
    const db = this.cfg.get('database', { infer: true });
    if (!db.migrate) {
      this.logger.log('Skipping migrations (DB_MIGRATE=false)');
      return;
    }
    await this.run(db.migrationsDir);
  }

  async run(dir: string): Promise<string[]> {
    const files = (await readdir(dir)).filter((f) => f.endsWith('.up.sql')).sort();
    const client = await this.pool.connect();
    try {
      await client.query('SELECT pg_advisory_lock($1)', [LOCK_KEY]);
      try {
        return await this.applyPending(client, dir, files);
      } finally {
        await client.query('SELECT pg_advisory_unlock($1)', [LOCK_KEY]);
      }
    } finally {
      client.release();
    }
  }

  private async applyPending(client: MigrationClient, dir: string, files: string[]): Promise<string[]> {
    await client.query(
      `CREATE TABLE IF NOT EXISTS schema_migrations (
         version TEXT PRIMARY KEY,
         applied_at TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT NOW()
       )`,
    );
    const { rows } = await client.query<{ version: string }>('SELECT version FROM schema_migrations');
    const applied = new Set(rows.map((r) => r.version));

    const ran: string[] = [];
    for (const file of files) {
      const version = file.replace(/\.up\.sql$/, '');
      if (applied.has(version)) continue;

      const sql = await readFile(join(dir, file), 'utf8');
      await client.query('BEGIN');
      try {
        await client.query(sql);
        await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [version]);
        await client.query('COMMIT');
      } catch (e) {
        // ROLLBACK 실패가 원래 에러를 가리지 않도록 로그만 남김
        await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
          this.logger.error(`Rollback of ${version} failed: ${errorMessage(rollbackErr)}`);
        });
        throw new MigrationError(version, { cause: e });
      }
      this.logger.log(`Applied migration ${version}`);
      ran.push(version);
    }

    if (ran.length === 0) this.logger.log('Database schema is up to date');
    return ran;
  }
}
