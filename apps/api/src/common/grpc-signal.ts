import type { ServerUnaryCall } from '@grpc/grpc-js';

/** 핸들러가 실제로 쓰는 ServerUnaryCall 부분 */
export type CancellableCall = Pick<ServerUnaryCall<unknown, unknown>, 'cancelled'> & {
  once(event: 'cancelled', listener: () => void): unknown;
};

/** gRPC 호출이 취소되면 abort 되는 AbortSignal */
export function callSignal(call: CancellableCall): AbortSignal {
  const controller = new AbortController();
  if (call.cancelled) controller.abort();
  else call.once('cancelled', () => controller.abort());
  return controller.signal;
}
