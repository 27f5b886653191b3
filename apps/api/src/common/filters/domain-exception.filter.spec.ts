import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import {
  EmptyInputError,
  HealthCheckFailedError,
  NotFoundError,
  PersistenceError,
  QuoteRequestError,
  QuoteServiceError,
  RequestAbortedError,
  UpstreamStatusError,
} from '../errors';
import { DomainExceptionFilter } from './domain-exception.filter';

class FakeResponse {
  statusCode = 0;
  body: unknown;

  constructor(
    readonly headersSent = false,
    readonly destroyed = false,
  ) {}

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): this {
    this.body = body;
    return this;
  }
}

function render(err: QuoteServiceError, res = new FakeResponse()) {
  new DomainExceptionFilter().catch(err, new ExecutionContextHost([{}, res]));
  return res;
}

describe('DomainExceptionFilter', () => {
  it('answers 404 for a missing record', () => {
    const res = render(new NotFoundError('USDT/RUB'));

    expect(res.statusCode).toBe(404);
    expect(res.body).toEqual({ error: 'NOT_FOUND', message: 'no quote found for trading pair: USDT/RUB' });
  });

  it.each([
    [new QuoteRequestError('fetch', new UpstreamStatusError(500, 'oops')), 502],
    [new QuoteRequestError('fetch', new EmptyInputError()), 502],
    [new QuoteRequestError('persist', new PersistenceError('timeout')), 503],
    [new RequestAbortedError(), 499],
  ])('maps %s to %i', (err, status) => {
    expect(render(err).statusCode).toBe(status);
  });

  it('returns the unhealthy payload with 503', () => {
    const report = { status: 'unhealthy' as const, message: 'Database health check failed: ECONNREFUSED' };

    const res = render(new HealthCheckFailedError(report));

    expect(res.statusCode).toBe(503);
    expect(res.body).toEqual(report);
  });

  it('writes nothing once the client is gone', () => {
    const res = render(new RequestAbortedError(), new FakeResponse(false, true));

    expect(res.statusCode).toBe(0);
    expect(res.body).toBeUndefined();
  });
});
