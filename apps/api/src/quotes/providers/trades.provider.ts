import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { AxiosError, AxiosResponse } from 'axios';
import { firstValueFrom } from 'rxjs';
import { TradeListSchema, type Trade } from '@ratedesk/shared';
import { toMarketId, type AppConfig } from '../../config/configuration';
import {
  DecodeError,
  QuoteServiceError,
  RequestAbortedError,
  TransportError,
  UpstreamStatusError,
  errorMessage,
} from '../../common/errors';
import { MetricsService, type UpstreamEndpoint } from '../../metrics/metrics.service';
import { extractPrices } from '../trade-price.util';
import type { Quote, QuoteSource } from '../types';

const MAX_BODY_IN_ERROR = 2048;

/**
 * 거래소 최근 체결(/api/v2/trades)로 시세를 만드는 프로바이더.
 * 재시도하지 않음. 실패는 그대로 호출자에게 전달
 */
@Injectable()
export class TradesProvider implements QuoteSource {
  private readonly logger = new Logger(TradesProvider.name);

  constructor(
    private readonly http: HttpService,
    private readonly cfg: ConfigService<AppConfig, true>,
    private readonly metrics: MetricsService,
  ) {}

  async fetchQuote(pair: string, signal?: AbortSignal): Promise<Quote> {
    const upstream = this.cfg.get('upstream', { infer: true });
    const market = toMarketId(pair);

    this.logger.log(`Fetching ${pair} trades (market=${market}, limit=${upstream.tradesLimit})`);
    const res = await this.request('trades', '/api/v2/trades', signal, {
      market,
      limit: upstream.tradesLimit,
    });
    const trades = this.decode(res.data);

    const prices = extractPrices(trades, {
      onInvalidPrice: (t) => this.logger.warn(`Skipping trade ${t.id}: unparseable price "${t.price ?? ''}"`),
    });
    const quote: Quote = { tradingPair: pair, ...prices };

    this.logger.log(
      `Fetched ${pair} quote ask=${quote.askPrice} bid=${quote.bidPrice} ` +
        `at=${quote.observedAt.toISOString()} trades=${trades.length}`,
    );
    return quote;
  }

  async probeReachable(signal?: AbortSignal): Promise<void> {
    await this.request('markets', '/api/v2/markets', signal);
  }

  private async request(
    endpoint: UpstreamEndpoint,
    path: string,
    signal?: AbortSignal,
    params?: Record<string, string | number>,
  ): Promise<AxiosResponse<string>> {
    const done = this.metrics.startUpstreamTimer(endpoint);
    try {
      const res = await firstValueFrom(
        this.http.get<string>(path, {
          params,
          signal,
          responseType: 'text',
          headers: { Accept: 'application/json' },
          validateStatus: (s) => s === 200,
        }),
      );
      done('success');
      return res;
    } catch (e) {
      done('error');
      throw this.toDomainError(e, signal);
    }
  }

  private decode(body: string): Trade[] {
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch (e) {
      throw new DecodeError(`failed to unmarshal response: ${errorMessage(e)}`, { cause: e });
    }

    const parsed = TradeListSchema.safeParse(json);
    if (!parsed.success) {
      const first = parsed.error.issues[0];
      const where = first.path.length ? first.path.join('.') : '(root)';
      throw new DecodeError(`unexpected trades payload at ${where}: ${first.message}`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  private toDomainError(e: unknown, signal?: AbortSignal): QuoteServiceError {
    if (signal?.aborted) return new RequestAbortedError({ cause: e });
    if (e instanceof AxiosError) {
      if (e.response) {
        return new UpstreamStatusError(e.response.status, bodyText(e.response.data));
      }
      return new TransportError(`failed to make request: ${e.message}`, { cause: e });
    }
    return new TransportError(`failed to make request: ${errorMessage(e)}`, { cause: e });
  }
}

function bodyText(data: unknown): string {
  const s = typeof data === 'string' ? data : data === undefined ? '' : JSON.stringify(data);
  return s.length > MAX_BODY_IN_ERROR ? `${s.slice(0, MAX_BODY_IN_ERROR)}…` : s;
}
