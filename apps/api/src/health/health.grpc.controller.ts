import { Controller } from '@nestjs/common';
import { GrpcMethod } from '@nestjs/microservices';
import type { Metadata } from '@grpc/grpc-js';
import type { HealthResponse } from '@ratedesk/shared';
import { callSignal, type CancellableCall } from '../common/grpc-signal';
import { toRpcException } from '../common/grpc-errors';
import { GRPC_SERVICE } from '../grpc.options';
import { HealthService } from './health.service';

export type HealthcheckRequest = Record<string, never>;

@Controller()
export class HealthGrpcController {
  constructor(private readonly health: HealthService) {}

  @GrpcMethod(GRPC_SERVICE, 'Healthcheck')
  async healthcheck(
    _req: HealthcheckRequest,
    _meta: Metadata,
    call: CancellableCall,
  ): Promise<HealthResponse> {
    try {
      return await this.health.check(callSignal(call));
    } catch (e) {
      throw toRpcException(e);
    }
  }
}
