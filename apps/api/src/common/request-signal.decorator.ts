import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { Response } from 'express';

type ClosableResponse = Pick<Response, 'writableFinished'> & {
  on(event: 'close', listener: () => void): unknown;
};

export function responseSignal(res: ClosableResponse): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}

/**
 * 응답을 쓰기 전에 연결이 닫히면 abort 되는 AbortSignal.
 * 하위 HTTP 호출까지 취소를 전달하는 데 사용
 */
export const RequestSignal = createParamDecorator((_: unknown, ctx: ExecutionContext): AbortSignal =>
  responseSignal(ctx.switchToHttp().getResponse<Response>()),
);
