// 시세 비즈니스 로직. 거래소 조회 → 저장 → 반환 (전부 성공해야 응답)
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../config/configuration';
import {
  PersistenceError,
  QuoteRequestError,
  QuoteServiceError,
  RequestAbortedError,
  errorMessage,
  type QuoteStage,
} from '../common/errors';
import { MetricsService } from '../metrics/metrics.service';
import { QUOTE_SOURCE, QUOTE_STORE, type Quote, type QuoteRecord, type QuoteSource, type QuoteStore } from './types';

@Injectable()
export class QuotesService {
  private readonly logger = new Logger(QuotesService.name);

  constructor(
    @Inject(QUOTE_SOURCE) private readonly source: QuoteSource,
    @Inject(QUOTE_STORE) private readonly store: QuoteStore,
    private readonly cfg: ConfigService<AppConfig, true>,
    private readonly metrics: MetricsService,
  ) {}

  get tradingPair(): string {
    return this.cfg.get('tradingPair', { infer: true });
  }

  async getQuote(signal?: AbortSignal): Promise<Quote> {
    let quote: Quote;
    try {
      quote = await this.source.fetchQuote(this.tradingPair, signal);
    } catch (e) {
      throw this.fail('fetch', e);
    }

    let record: QuoteRecord;
    try {
      // 호출자가 이미 떠났으면 저장하지 않음
      if (signal?.aborted) throw new RequestAbortedError();
      record = await this.store.save(quote, new Date());
    } catch (e) {
      throw this.fail('persist', e);
    }

    this.metrics.recordQuote('success');
    return {
      tradingPair: record.tradingPair,
      askPrice: record.askPrice,
      bidPrice: record.bidPrice,
      observedAt: record.observedAt,
    };
  }

  latest(): Promise<QuoteRecord> {
    return this.store.latest(this.tradingPair);
  }

  history(from: Date, to: Date): Promise<QuoteRecord[]> {
    return this.store.range(this.tradingPair, from, to);
  }

  // 조회 단계의 분류되지 않은 에러는 버그이므로 감싸지 않고 그대로 던짐 (500/INTERNAL)
  private fail(stage: QuoteStage, e: unknown): unknown {
    this.metrics.recordQuote(stage === 'fetch' ? 'fetch_error' : 'persist_error');

    let cause: QuoteServiceError;
    if (e instanceof QuoteServiceError) cause = e;
    else if (stage === 'persist') cause = new PersistenceError(errorMessage(e), { cause: e });
    else {
      this.logger.error(`Unexpected error while fetching quote: ${e instanceof Error ? e.stack ?? e.message : String(e)}`);
      return e;
    }

    const err = new QuoteRequestError(stage, cause);
    this.logger.error(err.message);
    return err;
  }
}
