import { Injectable } from '@nestjs/common';
import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';
import type { HealthStatus } from '@ratedesk/shared';

export type QuoteOutcome = 'success' | 'fetch_error' | 'persist_error';
export type UpstreamEndpoint = 'trades' | 'markets';

const STATUSES: readonly HealthStatus[] = ['healthy', 'degraded', 'unhealthy'];

@Injectable()
export class MetricsService {
  readonly registry = new Registry();

  private readonly quoteRequests = new Counter({
    name: 'quote_requests_total',
    help: 'Quote requests by outcome',
    labelNames: ['outcome'] as const,
    registers: [this.registry],
  });

  private readonly upstreamDuration = new Histogram({
    name: 'upstream_request_duration_seconds',
    help: 'Duration of requests to the exchange API',
    labelNames: ['endpoint', 'outcome'] as const,
    buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
    registers: [this.registry],
  });

  private readonly healthStatus = new Gauge({
    name: 'health_status',
    help: 'Last reported health status (1 = current)',
    labelNames: ['status'] as const,
    registers: [this.registry],
  });

  constructor() {
    collectDefaultMetrics({ register: this.registry });
  }

  recordQuote(outcome: QuoteOutcome): void {
    this.quoteRequests.inc({ outcome });
  }

  startUpstreamTimer(endpoint: UpstreamEndpoint): (outcome: 'success' | 'error') => void {
    const end = this.upstreamDuration.startTimer({ endpoint });
    return (outcome) => {
      end({ outcome });
    };
  }

  recordHealth(status: HealthStatus): void {
    for (const s of STATUSES) this.healthStatus.set({ status: s }, s === status ? 1 : 0);
  }

  render(): Promise<string> {
    return this.registry.metrics();
  }
}
