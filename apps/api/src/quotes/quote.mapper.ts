import type { QuoteRecordResponse, QuoteResponse } from '@ratedesk/shared';
import type { Quote, QuoteRecord } from './types';

export function toQuoteResponse(q: Quote): QuoteResponse {
  return {
    tradingPair: q.tradingPair,
    askPrice: q.askPrice,
    bidPrice: q.bidPrice,
    timestamp: q.observedAt.toISOString(),
  };
}

export function toRecordResponse(r: QuoteRecord): QuoteRecordResponse {
  return { id: r.id, ...toQuoteResponse(r), persistedAt: r.persistedAt.toISOString() };
}

/** google.protobuf.Timestamp */
export type ProtoTimestamp = { seconds: string; nanos: number };

export function toProtoTimestamp(d: Date): ProtoTimestamp {
  const ms = d.getTime();
  const seconds = Math.floor(ms / 1000);
  return { seconds: String(seconds), nanos: (ms - seconds * 1000) * 1_000_000 };
}
