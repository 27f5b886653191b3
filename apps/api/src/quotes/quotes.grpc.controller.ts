import { Controller } from '@nestjs/common';
import { GrpcMethod } from '@nestjs/microservices';
import type { Metadata } from '@grpc/grpc-js';
import { callSignal, type CancellableCall } from '../common/grpc-signal';
import { toRpcException } from '../common/grpc-errors';
import { GRPC_SERVICE } from '../grpc.options';
import { toProtoTimestamp, type ProtoTimestamp } from './quote.mapper';
import { QuotesService } from './quotes.service';

export type GetQuoteRequest = Record<string, never>;

export type GetQuoteResponse = {
  tradingPair: string;
  askPrice: number;
  bidPrice: number;
  timestamp: ProtoTimestamp;
};

@Controller()
export class QuotesGrpcController {
  constructor(private readonly quotes: QuotesService) {}

  @GrpcMethod(GRPC_SERVICE, 'GetQuote')
  async getQuote(
    _req: GetQuoteRequest,
    _meta: Metadata,
    call: CancellableCall,
  ): Promise<GetQuoteResponse> {
    try {
      const q = await this.quotes.getQuote(callSignal(call));
      return {
        tradingPair: q.tradingPair,
        askPrice: q.askPrice,
        bidPrice: q.bidPrice,
        timestamp: toProtoTimestamp(q.observedAt),
      };
    } catch (e) {
      throw toRpcException(e);
    }
  }
}
