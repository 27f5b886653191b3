import type { Trade } from '@ratedesk/shared';
import { EmptyInputError, NoValidPricesError } from '../common/errors';
import { extractPrices, parsePrice, parseTradeTime } from './trade-price.util';

function trade(price: string, createdAt = '2025-07-28T21:22:14+03:00', id = 1): Trade {
  return { id, price, volume: '10', created_at: createdAt };
}

describe('extractPrices', () => {
  it('takes the highest price as ask and the lowest as bid', () => {
    const r = extractPrices([
      trade('81.25', '2025-07-28T21:22:14+03:00', 3),
      trade('81.20', '2025-07-28T21:21:50+03:00', 2),
      trade('81.30', '2025-07-28T21:20:01+03:00', 1),
    ]);

    expect(r.askPrice).toBe(81.3);
    expect(r.bidPrice).toBe(81.2);
    expect(r.observedAt.toISOString()).toBe('2025-07-28T18:22:14.000Z');
  });

  it('uses the same price for ask and bid when one valid price is left', () => {
    const skipped: Trade[] = [];
    const r = extractPrices([trade('invalid'), trade('81.25')], {
      onInvalidPrice: (t) => skipped.push(t),
    });

    expect(r.askPrice).toBe(81.25);
    expect(r.bidPrice).toBe(81.25);
    expect(skipped.map((t) => t.price)).toEqual(['invalid']);
  });

  it('does not depend on trade order', () => {
    const prices = ['80.1', '82.4', '79.9', '81.0'];
    const forward = extractPrices(prices.map((p) => trade(p)));
    const backward = extractPrices([...prices].reverse().map((p) => trade(p)));

    expect(forward.askPrice).toBe(82.4);
    expect(forward.bidPrice).toBe(79.9);
    expect(backward.askPrice).toBe(forward.askPrice);
    expect(backward.bidPrice).toBe(forward.bidPrice);
  });

  it('keeps ask >= bid for arbitrary price sets', () => {
    const sets = [['1'], ['3', '2', '1'], ['0.5', '100', '42.42', '42.41'], ['7', '7', '7']];
    for (const set of sets) {
      const r = extractPrices(set.map((p) => trade(p)));
      const parsed = set.map(Number);
      expect(r.askPrice).toBe(Math.max(...parsed));
      expect(r.bidPrice).toBe(Math.min(...parsed));
      expect(r.askPrice).toBeGreaterThanOrEqual(r.bidPrice);
    }
  });

  it('takes the timestamp from the newest trade, not the first one', () => {
    const r = extractPrices([
      trade('81.25', '2025-07-28T21:20:00+03:00'),
      trade('81.20', '2025-07-28T18:25:00Z'),
    ]);

    expect(r.observedAt.toISOString()).toBe('2025-07-28T18:25:00.000Z');
  });

  it('falls back to the clock when no timestamp parses', () => {
    const now = new Date('2026-01-02T03:04:05.000Z');
    const r = extractPrices([trade('81.25', 'yesterday')], { now: () => now });

    expect(r.observedAt).toBe(now);
  });

  it('treats a missing price or timestamp like an unparseable one', () => {
    const now = new Date('2026-01-02T03:04:05.000Z');
    const r = extractPrices([{ id: 2, price: null }, { id: 1, price: '81.25', created_at: null }], {
      now: () => now,
    });

    expect(r).toEqual({ askPrice: 81.25, bidPrice: 81.25, observedAt: now });
  });

  it('fails on an empty list', () => {
    expect(() => extractPrices([])).toThrow(EmptyInputError);
  });

  it('fails when no price parses', () => {
    expect(() => extractPrices([trade('not-a-number')])).toThrow(NoValidPricesError);
  });
});

describe('parsePrice', () => {
  it.each([
    ['81.25', 81.25],
    [' 81.25 ', 81.25],
    ['1e2', 100],
    ['.5', 0.5],
  ])('parses %p', (raw, expected) => {
    expect(parsePrice(raw)).toBe(expected);
  });

  it.each(['', 'abc', 'NaN', 'Infinity', '0x10', '81,25'])('rejects %p', (raw) => {
    expect(parsePrice(raw)).toBeNull();
  });
});

describe('parseTradeTime', () => {
  it('parses RFC3339 with an offset', () => {
    expect(parseTradeTime('2025-07-28T21:22:14+03:00')?.toISOString()).toBe('2025-07-28T18:22:14.000Z');
  });

  it('rejects a date without a zone', () => {
    expect(parseTradeTime('2025-07-28T21:22:14')).toBeNull();
  });
});
