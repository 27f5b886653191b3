import { Metadata, status as GrpcStatus } from '@grpc/grpc-js';
import { RpcException } from '@nestjs/microservices';
import { HealthCheckFailedError, QuoteServiceError } from './errors';
import { statusFor } from './error-status';

export type GrpcErrorPayload = { code: GrpcStatus; message: string; metadata?: Metadata };

/** 도메인 에러 → gRPC 상태 코드. 알 수 없는 에러는 INTERNAL, 메시지는 숨김 */
export function toGrpcError(err: unknown): GrpcErrorPayload {
  if (!(err instanceof QuoteServiceError)) {
    return { code: GrpcStatus.INTERNAL, message: 'internal error' };
  }

  const payload: GrpcErrorPayload = { code: statusFor(err).grpc, message: err.message };
  if (err instanceof HealthCheckFailedError) {
    // 상태 값을 트레일러로 같이 보냄
    const metadata = new Metadata();
    metadata.set('health-status', err.report.status);
    payload.metadata = metadata;
  }
  return payload;
}

export function toRpcException(err: unknown): RpcException {
  return new RpcException(toGrpcError(err));
}
