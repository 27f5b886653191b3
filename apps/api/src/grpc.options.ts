import { GrpcOptions, Transport } from '@nestjs/microservices';
import { resolve } from 'node:path';

export const GRPC_PACKAGE = 'quotes.v1';
export const GRPC_SERVICE = 'QuoteService';
export const PROTO_PATH = resolve(__dirname, '../proto/quotes/v1/quote-service.proto');

// 생성 코드 없이 .proto를 런타임에 로드
export function grpcOptions(port: number): GrpcOptions {
  return {
    transport: Transport.GRPC,
    options: {
      package: GRPC_PACKAGE,
      protoPath: PROTO_PATH,
      url: `0.0.0.0:${port}`,
      // close() 시 진행 중인 호출을 끊지 않고 끝날 때까지 기다림 (상한은 SHUTDOWN_GRACE_MS)
      gracefulShutdown: true,
      loader: {
        keepCase: false,
        longs: String,
        enums: String,
        defaults: true,
        oneofs: true,
      },
    },
  };
}
