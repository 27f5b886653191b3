import type { Trade } from '@ratedesk/shared';
import { EmptyInputError, NoValidPricesError } from '../common/errors';

export type ExtractedPrices = {
  askPrice: number;
  bidPrice: number;
  observedAt: Date;
};

export type ExtractOptions = {
  now?: () => Date;
  onInvalidPrice?: (trade: Trade) => void;
};

const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const RFC3339 =
  /^\d{4}-\d{2}-\d{2}[Tt ]\d{2}:\d{2}:\d{2}(\.\d+)?([Zz]|[+-]\d{2}:\d{2})$/;

export function parsePrice(raw: string): number | null {
  const s = raw.trim();
  if (!DECIMAL.test(s)) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

export function parseTradeTime(raw: string): Date | null {
  if (!RFC3339.test(raw)) return null;
  const ms = Date.parse(raw);
  return Number.isNaN(ms) ? null : new Date(ms);
}

/**
 * 최근 체결 목록에서 ask/bid를 산출.
 * ask = 파싱된 가격 중 최댓값, bid = 최솟값 (같은 집합에서 뽑으므로 항상 ask >= bid).
 * 파싱 안 되는 가격은 건너뜀. 시각은 created_at이 가장 늦은 체결 기준이고,
 * 유효한 시각이 하나도 없으면 현재 시각을 씀.
 */
export function extractPrices(trades: readonly Trade[], opts: ExtractOptions = {}): ExtractedPrices {
  if (trades.length === 0) throw new EmptyInputError();

  let askPrice = -Infinity;
  let bidPrice = Infinity;
  let valid = 0;
  let newest: Date | null = null;

  for (const trade of trades) {
    const price = parsePrice(trade.price ?? '');
    if (price === null) {
      opts.onInvalidPrice?.(trade);
    } else {
      valid++;
      if (price > askPrice) askPrice = price;
      if (price < bidPrice) bidPrice = price;
    }

    const at = parseTradeTime(trade.created_at ?? '');
    if (at && (!newest || at.getTime() > newest.getTime())) newest = at;
  }

  if (valid === 0) throw new NoValidPricesError(trades.length);

  return {
    askPrice,
    bidPrice,
    observedAt: newest ?? (opts.now ?? (() => new Date()))(),
  };
}
