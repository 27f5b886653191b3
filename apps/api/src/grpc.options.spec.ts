import type { INestMicroservice } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { Client, credentials, type ServiceError } from '@grpc/grpc-js';
import { GRPC_PACKAGE, GRPC_SERVICE, grpcOptions } from './grpc.options';
import { QuotesGrpcController } from './quotes/quotes.grpc.controller';
import { QuotesService } from './quotes/quotes.service';
import type { Quote } from './quotes/types';

const PORT = 50611;

const QUOTE: Quote = {
  tradingPair: 'USDT/RUB',
  askPrice: 81.3,
  bidPrice: 81.2,
  observedAt: new Date('2025-07-28T18:22:14.000Z'),
};

const delay = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// 응답 메시지는 디코딩하지 않고 바이트 그대로 받음
function callGetQuote(client: Client): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    client.makeUnaryRequest(
      `/${GRPC_PACKAGE}.${GRPC_SERVICE}/GetQuote`,
      () => Buffer.alloc(0),
      (buf: Buffer) => buf,
      {},
      (err: ServiceError | null, value?: Buffer) => {
        if (err) reject(err);
        else resolve(value ?? Buffer.alloc(0));
      },
    );
  });
}

describe('grpcOptions', () => {
  it('asks the transport to drain calls on close', () => {
    expect(grpcOptions(PORT).options).toMatchObject({ gracefulShutdown: true, url: `0.0.0.0:${PORT}` });
  });

  describe('closing the server', () => {
    let app: INestMicroservice;
    let client: Client;

    beforeEach(async () => {
      const getQuote = () => delay(400).then(() => QUOTE);
      const moduleRef = await Test.createTestingModule({
        controllers: [QuotesGrpcController],
        providers: [{ provide: QuotesService, useValue: { getQuote } }],
      }).compile();

      app = moduleRef.createNestMicroservice(grpcOptions(PORT));
      await app.listen();
      client = new Client(`127.0.0.1:${PORT}`, credentials.createInsecure());
    });

    afterEach(() => {
      client.close();
    });

    it('lets an in-flight GetQuote finish before the server stops', async () => {
      const inFlight = callGetQuote(client);
      await delay(100);

      await app.close();

      const body = await inFlight;
      // field 1 (trading_pair), length-delimited
      expect(body[0]).toBe(0x0a);
      expect(body.toString('utf8', 2, 2 + body[1])).toBe('USDT/RUB');
    });
  });
});
