// apps/api/src/health/health.controller.ts
import { Controller, Get, Header } from '@nestjs/common';
import { SkipThrottle } from '@nestjs/throttler';
import type { HealthResponse } from '@ratedesk/shared';
import { RequestSignal } from '../common/request-signal.decorator';
import { HealthService } from './health.service';

@SkipThrottle()
@Controller()
export class HealthController {
  constructor(private readonly health: HealthService) {}

  // 프로세스 생존 여부만. 의존성은 보지 않음
  @Get('/')
  root() {
    return { status: 'ok' };
  }

  // 저장소 실패 시 503 + unhealthy payload (DomainExceptionFilter)
  @Get('/health')
  @Header('Cache-Control', 'no-store')
  check(@RequestSignal() signal: AbortSignal): Promise<HealthResponse> {
    return this.health.check(signal);
  }
}
