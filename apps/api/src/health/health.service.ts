import { Inject, Injectable, Logger } from '@nestjs/common';
import type { HealthResponse } from '@ratedesk/shared';
import { HealthCheckFailedError, errorMessage } from '../common/errors';
import { MetricsService } from '../metrics/metrics.service';
import { QUOTE_SOURCE, QUOTE_STORE, type QuoteSource, type QuoteStore } from '../quotes/types';

/**
 * 저장소와 거래소 상태를 하나로 합침. 캐시 없이 매번 새로 확인.
 *  - 저장소 실패: unhealthy + 호출 자체도 실패 (HealthCheckFailedError)
 *  - 거래소만 실패: degraded, 호출은 성공
 *  - 둘 다 성공: healthy
 */
@Injectable()
export class HealthService {
  private readonly logger = new Logger(HealthService.name);

  constructor(
    @Inject(QUOTE_STORE) private readonly store: QuoteStore,
    @Inject(QUOTE_SOURCE) private readonly source: QuoteSource,
    private readonly metrics: MetricsService,
  ) {}

  async check(signal?: AbortSignal): Promise<HealthResponse> {
    try {
      await this.store.probeAlive();
    } catch (e) {
      const report: HealthResponse = {
        status: 'unhealthy',
        message: `Database health check failed: ${errorMessage(e)}`,
      };
      this.logger.error(report.message);
      this.metrics.recordHealth(report.status);
      throw new HealthCheckFailedError(report, { cause: e });
    }

    let report: HealthResponse = { status: 'healthy', message: 'Service is healthy' };
    try {
      await this.source.probeReachable(signal);
    } catch (e) {
      report = { status: 'degraded', message: `Exchange API health check failed: ${errorMessage(e)}` };
      this.logger.warn(report.message);
    }

    this.metrics.recordHealth(report.status);
    return report;
  }
}
