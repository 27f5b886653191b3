import { Inject, Injectable, Logger } from '@nestjs/common';
import type { QueryResult, QueryResultRow } from 'pg';
import { NotFoundError, PersistenceError, errorMessage } from '../common/errors';
import { withTimeout } from '../common/timeout';
import type { Quote, QuoteRecord, QuoteStore } from '../quotes/types';
import { PG_POOL, PROBE_TIMEOUT_MS } from './database.constants';

/** pg Pool 중 저장소가 실제로 쓰는 부분. 테스트에서는 가짜 구현으로 대체 */
export interface Queryable {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

type QuoteRow = {
  id: string;
  trading_pair: string;
  ask_price: string;
  bid_price: string;
  timestamp: Date;
  created_at: Date;
};

const COLUMNS = 'id, trading_pair, ask_price, bid_price, timestamp, created_at';

function toRecord(row: QuoteRow): QuoteRecord {
  return {
    id: String(row.id),
    tradingPair: row.trading_pair,
    askPrice: Number(row.ask_price),
    bidPrice: Number(row.bid_price),
    observedAt: row.timestamp,
    persistedAt: row.created_at,
  };
}

@Injectable()
export class PgQuoteStore implements QuoteStore {
  private readonly logger = new Logger(PgQuoteStore.name);

  constructor(@Inject(PG_POOL) private readonly db: Queryable) {}

  async save(quote: Quote, persistedAt: Date): Promise<QuoteRecord> {
    let result: QueryResult<QuoteRow>;
    try {
      result = await this.db.query<QuoteRow>(
        `INSERT INTO quotes (trading_pair, ask_price, bid_price, timestamp, created_at)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING ${COLUMNS}`,
        [quote.tradingPair, quote.askPrice, quote.bidPrice, quote.observedAt, persistedAt],
      );
    } catch (e) {
      throw new PersistenceError(`failed to save quote: ${errorMessage(e)}`, { cause: e });
    }
    const row = result.rows[0];
    if (!row) throw new PersistenceError('failed to save quote: insert returned no row');

    const record = toRecord(row);
    this.logger.log(
      `Quote saved id=${record.id} pair=${record.tradingPair} ask=${record.askPrice} bid=${record.bidPrice}`,
    );
    return record;
  }

  async latest(pair: string): Promise<QuoteRecord> {
    const { rows } = await this.read(
      `SELECT ${COLUMNS} FROM quotes
       WHERE trading_pair = $1
       ORDER BY created_at DESC
       LIMIT 1`,
      [pair],
    );
    if (rows.length === 0) throw new NotFoundError(pair);
    return toRecord(rows[0]);
  }

  async range(pair: string, start: Date, end: Date): Promise<QuoteRecord[]> {
    const { rows } = await this.read(
      `SELECT ${COLUMNS} FROM quotes
       WHERE trading_pair = $1 AND created_at BETWEEN $2 AND $3
       ORDER BY created_at DESC`,
      [pair, start, end],
    );
    return rows.map(toRecord);
  }

  async probeAlive(): Promise<void> {
    await withTimeout(this.db.query('SELECT 1'), PROBE_TIMEOUT_MS, 'database ping');
  }

  private async read(text: string, values: unknown[]): Promise<QueryResult<QuoteRow>> {
    try {
      return await this.db.query<QuoteRow>(text, values);
    } catch (e) {
      throw new PersistenceError(`failed to query quotes: ${errorMessage(e)}`, { cause: e });
    }
  }
}
