import { Test } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { loadConfig } from '../config/configuration';
import {
  NoValidPricesError,
  NotFoundError,
  PersistenceError,
  QuoteRequestError,
  UpstreamStatusError,
} from '../common/errors';
import { MetricsService } from '../metrics/metrics.service';
import { QuotesService } from './quotes.service';
import { QUOTE_SOURCE, QUOTE_STORE, type Quote, type QuoteRecord } from './types';

const QUOTE: Quote = {
  tradingPair: 'USDT/RUB',
  askPrice: 81.3,
  bidPrice: 81.2,
  observedAt: new Date('2025-07-28T18:22:14.000Z'),
};

describe('QuotesService', () => {
  let service: QuotesService;
  let metrics: MetricsService;
  const source = { fetchQuote: jest.fn(), probeReachable: jest.fn() };
  const store = { save: jest.fn(), latest: jest.fn(), range: jest.fn(), probeAlive: jest.fn() };

  beforeEach(async () => {
    jest.resetAllMocks();
    store.save.mockImplementation(
      async (q: Quote, persistedAt: Date): Promise<QuoteRecord> => ({ ...q, id: '7', persistedAt }),
    );

    const moduleRef = await Test.createTestingModule({
      providers: [
        QuotesService,
        MetricsService,
        { provide: QUOTE_SOURCE, useValue: source },
        { provide: QUOTE_STORE, useValue: store },
        { provide: ConfigService, useValue: new ConfigService(loadConfig({}, [])) },
      ],
    }).compile();

    service = moduleRef.get(QuotesService);
    metrics = moduleRef.get(MetricsService);
  });

  describe('getQuote', () => {
    it('fetches the configured pair, persists it and returns the quote', async () => {
      source.fetchQuote.mockResolvedValue(QUOTE);

      const quote = await service.getQuote();

      expect(source.fetchQuote).toHaveBeenCalledWith('USDT/RUB', undefined);
      expect(store.save).toHaveBeenCalledWith(QUOTE, expect.any(Date));
      expect(quote).toEqual(QUOTE);
    });

    it('does not return a quote when the write fails', async () => {
      source.fetchQuote.mockResolvedValue(QUOTE);
      store.save.mockRejectedValue(new PersistenceError('connection terminated'));

      const err = await service.getQuote().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(QuoteRequestError);
      expect(err).toMatchObject({ stage: 'persist', code: 'PERSISTENCE_ERROR' });
      expect(err).toHaveProperty('message', 'failed to save quote: connection terminated');
    });

    it('wraps an unexpected write failure as a persistence error', async () => {
      source.fetchQuote.mockResolvedValue(QUOTE);
      store.save.mockRejectedValue(new Error('pool is closed'));

      const err = await service.getQuote().catch((e: unknown) => e);

      expect(err).toBeInstanceOf(QuoteRequestError);
      expect(err instanceof QuoteRequestError && err.cause).toBeInstanceOf(PersistenceError);
    });

    it('surfaces fetch errors without writing anything', async () => {
      source.fetchQuote.mockRejectedValue(new UpstreamStatusError(503, 'maintenance'));

      const err = await service.getQuote().catch((e: unknown) => e);

      expect(err).toMatchObject({ stage: 'fetch', code: 'UPSTREAM_STATUS' });
      expect(err).toHaveProperty(
        'message',
        'failed to get quote from exchange: API request failed with status 503: maintenance',
      );
      expect(store.save).not.toHaveBeenCalled();
    });

    it('does not relabel an unexpected fetch failure as an upstream error', async () => {
      const bug = new TypeError("Cannot read properties of undefined (reading 'price')");
      source.fetchQuote.mockRejectedValue(bug);

      const err = await service.getQuote().catch((e: unknown) => e);

      expect(err).toBe(bug);
      expect(store.save).not.toHaveBeenCalled();
      expect(await metrics.render()).toContain('quote_requests_total{outcome="fetch_error"} 1');
    });

    it('keeps the extractor error as the cause', async () => {
      const cause = new NoValidPricesError(3);
      source.fetchQuote.mockRejectedValue(cause);

      const err = await service.getQuote().catch((e: unknown) => e);

      expect(err instanceof QuoteRequestError && err.cause).toBe(cause);
    });

    it('skips the write when the caller has gone away', async () => {
      const controller = new AbortController();
      source.fetchQuote.mockImplementation(async () => {
        controller.abort();
        return QUOTE;
      });

      const err = await service.getQuote(controller.signal).catch((e: unknown) => e);

      expect(err).toMatchObject({ stage: 'persist', code: 'REQUEST_ABORTED' });
      expect(store.save).not.toHaveBeenCalled();
    });

    it('counts outcomes', async () => {
      source.fetchQuote.mockResolvedValueOnce(QUOTE).mockRejectedValueOnce(new UpstreamStatusError(500, ''));

      await service.getQuote();
      await service.getQuote().catch(() => undefined);

      const text = await metrics.render();
      expect(text).toContain('quote_requests_total{outcome="success"} 1');
      expect(text).toContain('quote_requests_total{outcome="fetch_error"} 1');
    });
  });

  it('reads the latest record for the configured pair', async () => {
    store.latest.mockRejectedValue(new NotFoundError('USDT/RUB'));

    await expect(service.latest()).rejects.toBeInstanceOf(NotFoundError);
    expect(store.latest).toHaveBeenCalledWith('USDT/RUB');
  });

  it('reads history for the configured pair', async () => {
    store.range.mockResolvedValue([]);
    const from = new Date('2025-07-28T00:00:00Z');
    const to = new Date('2025-07-29T00:00:00Z');

    await expect(service.history(from, to)).resolves.toEqual([]);
    expect(store.range).toHaveBeenCalledWith('USDT/RUB', from, to);
  });
});
