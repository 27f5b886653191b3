import { HttpStatus } from '@nestjs/common';
import { status as GrpcStatus } from '@grpc/grpc-js';
import type { QuoteServiceError } from './errors';

type StatusPair = { http: number; grpc: GrpcStatus };

// 클라이언트가 요청을 끊었을 때 (nginx 관례)
const CLIENT_CLOSED_REQUEST = 499;

const UPSTREAM: StatusPair = { http: HttpStatus.BAD_GATEWAY, grpc: GrpcStatus.UNAVAILABLE };

const BY_CODE: Record<string, StatusPair> = {
  TRANSPORT_ERROR: UPSTREAM,
  UPSTREAM_STATUS: UPSTREAM,
  DECODE_ERROR: UPSTREAM,
  EMPTY_INPUT: UPSTREAM,
  NO_VALID_PRICES: UPSTREAM,
  PERSISTENCE_ERROR: { http: HttpStatus.SERVICE_UNAVAILABLE, grpc: GrpcStatus.INTERNAL },
  NOT_FOUND: { http: HttpStatus.NOT_FOUND, grpc: GrpcStatus.NOT_FOUND },
  REQUEST_ABORTED: { http: CLIENT_CLOSED_REQUEST, grpc: GrpcStatus.CANCELLED },
  HEALTH_CHECK_FAILED: { http: HttpStatus.SERVICE_UNAVAILABLE, grpc: GrpcStatus.UNAVAILABLE },
};

const FALLBACK: StatusPair = { http: HttpStatus.INTERNAL_SERVER_ERROR, grpc: GrpcStatus.INTERNAL };

export function statusFor(err: QuoteServiceError): StatusPair {
  return BY_CODE[err.code] ?? FALLBACK;
}
