import { ArgumentsHost, Catch, ExceptionFilter, Logger } from '@nestjs/common';
import type { Response } from 'express';
import { HealthCheckFailedError, QuoteServiceError } from '../errors';
import { statusFor } from '../error-status';

/** 도메인 에러 → HTTP 응답. { error: CODE, message } 형태 */
@Catch(QuoteServiceError)
export class DomainExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(DomainExceptionFilter.name);

  catch(err: QuoteServiceError, host: ArgumentsHost): void {
    const res = host.switchToHttp().getResponse<Response>();
    const { http } = statusFor(err);

    if (res.headersSent || res.destroyed) {
      this.logger.debug(`Dropping ${err.code} response, connection already closed`);
      return;
    }

    // 헬스체크는 실패해도 상태 payload를 그대로 돌려줌
    if (err instanceof HealthCheckFailedError) {
      res.status(http).json(err.report);
      return;
    }
    res.status(http).json({ error: err.code, message: err.message });
  }
}
