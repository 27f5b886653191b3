import { ExecutionContext, Injectable } from '@nestjs/common';
import { ThrottlerGuard } from '@nestjs/throttler';

// 전역 가드는 gRPC 핸들러에도 걸리므로 HTTP 요청에만 레이트리밋 적용
@Injectable()
export class HttpThrottlerGuard extends ThrottlerGuard {
  canActivate(ctx: ExecutionContext): Promise<boolean> {
    if (ctx.getType() !== 'http') return Promise.resolve(true);
    return super.canActivate(ctx);
  }
}
