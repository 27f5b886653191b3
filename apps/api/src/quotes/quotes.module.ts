// 시세 도메인을 하나의 모듈로 묶음.
import { Module } from '@nestjs/common';
import { HttpModule } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import type { AppConfig } from '../config/configuration';
import { TradesProvider } from './providers/trades.provider';
import { QuotesController } from './quotes.controller';
import { QuotesGrpcController } from './quotes.grpc.controller';
import { QuotesService } from './quotes.service';
import { QUOTE_SOURCE } from './types';

@Module({
  imports: [
    // 거래소 호출용. 전체 요청 제한 시간은 설정값
    HttpModule.registerAsync({
      inject: [ConfigService],
      useFactory: (cfg: ConfigService<AppConfig, true>) => {
        const upstream = cfg.get('upstream', { infer: true });
        return {
          baseURL: upstream.baseUrl,
          timeout: upstream.timeoutMs,
          maxRedirects: 0,
          headers: { 'User-Agent': upstream.userAgent },
        };
      },
    }),
  ],
  controllers: [QuotesController, QuotesGrpcController],
  providers: [QuotesService, TradesProvider, { provide: QUOTE_SOURCE, useExisting: TradesProvider }],
  exports: [QuotesService, QUOTE_SOURCE],
})
export class QuotesModule {}
