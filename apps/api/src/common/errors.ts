// 도메인 에러 분류. code는 HTTP/gRPC 응답에 그대로 노출되는 안정적인 식별자
import type { HealthResponse } from '@ratedesk/shared';

export abstract class QuoteServiceError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** 거래소로 요청을 보내지 못했거나 연결이 끊김 */
export class TransportError extends QuoteServiceError {
  readonly code = 'TRANSPORT_ERROR';
}

/** 거래소가 200이 아닌 상태 코드로 응답함. 본문은 진단용으로 보관 */
export class UpstreamStatusError extends QuoteServiceError {
  readonly code = 'UPSTREAM_STATUS';

  constructor(readonly status: number, readonly body: string) {
    super(`API request failed with status ${status}: ${body}`);
  }
}

export class DecodeError extends QuoteServiceError {
  readonly code = 'DECODE_ERROR';
}

export class EmptyInputError extends QuoteServiceError {
  readonly code = 'EMPTY_INPUT';

  constructor() {
    super('no trades data available');
  }
}

export class NoValidPricesError extends QuoteServiceError {
  readonly code = 'NO_VALID_PRICES';

  constructor(readonly tradeCount: number) {
    super(`no valid prices found in ${tradeCount} trades`);
  }
}

export class PersistenceError extends QuoteServiceError {
  readonly code = 'PERSISTENCE_ERROR';
}

export class NotFoundError extends QuoteServiceError {
  readonly code = 'NOT_FOUND';

  constructor(readonly tradingPair: string) {
    super(`no quote found for trading pair: ${tradingPair}`);
  }
}

/** 호출자가 응답을 기다리지 않고 떠남 */
export class RequestAbortedError extends QuoteServiceError {
  readonly code = 'REQUEST_ABORTED';

  constructor(options?: { cause?: unknown }) {
    super('request was aborted by the caller', options);
  }
}

export type QuoteStage = 'fetch' | 'persist';

/** getQuote 실패. 어느 단계에서 실패했는지와 원인 에러를 함께 가짐 */
export class QuoteRequestError extends QuoteServiceError {
  readonly code: string;

  constructor(readonly stage: QuoteStage, readonly cause: QuoteServiceError) {
    super(
      stage === 'fetch'
        ? `failed to get quote from exchange: ${cause.message}`
        : `failed to save quote: ${cause.message}`,
      { cause },
    );
    this.code = cause.code;
  }
}

/**
 * 저장소 프로브 실패. 상태 값(unhealthy)과 호출 실패를 동시에 전달해야 하므로
 * 응답 payload를 에러가 들고 다님
 */
export class HealthCheckFailedError extends QuoteServiceError {
  readonly code = 'HEALTH_CHECK_FAILED';

  constructor(readonly report: HealthResponse, options?: { cause?: unknown }) {
    super(report.message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
