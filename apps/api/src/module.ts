// 앱의 뼈대 역할. 구성 관리 파일에 해당.
import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerModule } from '@nestjs/throttler';
import { HttpThrottlerGuard } from './common/guards/http-throttler.guard';
import { loadConfig, type AppConfig } from './config/configuration';
import { DatabaseModule } from './database/database.module';
import { HealthModule } from './health/health.module';
import { MetricsModule } from './metrics/metrics.module';
import { QuotesModule } from './quotes/quotes.module';

@Module({
  imports: [
    // .env 로딩 + 플래그/환경변수 검증 (전역)
    ConfigModule.forRoot({ isGlobal: true, load: [() => loadConfig()] }),
    // 간단 레이트리밋(전역, HTTP만)
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (cfg: ConfigService<AppConfig, true>) => {
        const t = cfg.get('throttle', { infer: true });
        return [{ ttl: t.ttlMs, limit: t.limit }];
      },
    }),
    MetricsModule,
    // PG 풀 + 저장소 + 마이그레이션
    DatabaseModule,
    // 시세 모듈
    QuotesModule,
    HealthModule,
  ],
  providers: [
    { provide: APP_GUARD, useClass: HttpThrottlerGuard },
  ],
})
export class AppModule {}
