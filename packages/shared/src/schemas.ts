import { z } from 'zod';

// 거래소 /api/v2/trades 응답의 한 건. price/volume/funds는 문자열 decimal.
// price/created_at이 비어 있는 체결은 목록 전체를 버리지 않고 추출 단계에서 건너뜀
export const TradeSchema = z.object({
  id: z.number().int(),
  hid: z.string().optional(),
  price: z.string().nullish(),
  volume: z.string().nullish(),
  funds: z.string().optional(),
  market: z.string().optional(),
  created_at: z.string().nullish(),
});

export const TradeListSchema = z.array(TradeSchema);

export type Trade = z.infer<typeof TradeSchema>;

export const HealthStatusSchema = z.enum(['healthy', 'degraded', 'unhealthy']);
export type HealthStatus = z.infer<typeof HealthStatusSchema>;

export const HealthResponseSchema = z.object({
  status: HealthStatusSchema,
  message: z.string(),
});
export type HealthResponse = z.infer<typeof HealthResponseSchema>;

export const QuoteResponseSchema = z.object({
  tradingPair: z.string(),
  askPrice: z.number(),
  bidPrice: z.number(),
  timestamp: z.string().datetime({ offset: true }),
});
export type QuoteResponse = z.infer<typeof QuoteResponseSchema>;

export const QuoteRecordResponseSchema = QuoteResponseSchema.extend({
  id: z.string(),
  persistedAt: z.string().datetime({ offset: true }),
});
export type QuoteRecordResponse = z.infer<typeof QuoteRecordResponseSchema>;
