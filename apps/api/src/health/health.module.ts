import { Module } from '@nestjs/common';
import { QuotesModule } from '../quotes/quotes.module';
import { HealthController } from './health.controller';
import { HealthGrpcController } from './health.grpc.controller';
import { HealthService } from './health.service';

@Module({
  imports: [QuotesModule],
  controllers: [HealthController, HealthGrpcController],
  providers: [HealthService],
})
export class HealthModule {}
