// 시세 관련 공용 타입. 서비스/프로바이더/저장소/컨트롤러가 공통으로 사용
export interface Quote {
  tradingPair: string;
  askPrice: number;
  bidPrice: number;
  observedAt: Date;
}

export interface QuoteRecord extends Quote {
  id: string;
  persistedAt: Date;
}

export interface QuoteSource {
  fetchQuote(pair: string, signal?: AbortSignal): Promise<Quote>;
  probeReachable(signal?: AbortSignal): Promise<void>;
}

export interface QuoteStore {
  save(quote: Quote, persistedAt: Date): Promise<QuoteRecord>;
  latest(pair: string): Promise<QuoteRecord>;
  range(pair: string, start: Date, end: Date): Promise<QuoteRecord[]>;
  probeAlive(): Promise<void>;
}

export const QUOTE_SOURCE = 'QUOTE_SOURCE';
export const QUOTE_STORE = 'QUOTE_STORE';
