// 1. 애플리케이션 진입점. 실행 담당.
import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { DomainExceptionFilter } from './common/filters/domain-exception.filter';
import type { AppConfig } from './config/configuration';
import { nestLogLevels } from './config/log-levels';
import { grpcOptions } from './grpc.options';
import { AppModule } from './module';

const logger = new Logger('Bootstrap');

async function bootstrap() {
  // 로그 레벨은 설정(.env 포함)이 로드된 뒤에 정해지므로 그때까지 버퍼링
  const app = await NestFactory.create(AppModule, { bufferLogs: true });
  const config = app.get<ConfigService<AppConfig, true>>(ConfigService);
  const http = config.get('http', { infer: true });
  const grpc = config.get('grpc', { infer: true });
  const db = config.get('database', { infer: true });
  const graceMs = config.get('shutdownGraceMs', { infer: true });
  app.useLogger(nestLogLevels(config.get('logLevel', { infer: true })));
  app.setGlobalPrefix(http.globalPrefix, { exclude: ['/', 'health', 'metrics'] });
  app.useGlobalPipes(new ValidationPipe({ transform: true, whitelist: true }));
  app.useGlobalFilters(new DomainExceptionFilter());
  app.connectMicroservice(grpcOptions(grpc.port));

  await app.startAllMicroservices();
  await app.listen(http.port);
  logger.log(
    `Serving ${config.get('tradingPair', { infer: true })} quotes: http=:${http.port} grpc=:${grpc.port} ` +
      `db=${db.host}:${db.port}/${db.name} upstream=${config.get('upstream', { infer: true }).baseUrl}`,
  );

  // 새 요청은 받지 않고 진행 중인 요청은 유예 시간 안에 끝내도록 함
  let closing = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (closing) return;
    closing = true;
    logger.log(`Received ${signal}, shutting down`);

    const force = setTimeout(() => {
      logger.error(`Shutdown did not finish within ${graceMs}ms, exiting`);
      process.exit(1);
    }, graceMs);
    force.unref();

    app.close().then(
      () => {
        logger.log('Server stopped');
        process.exit(0);
      },
      (err: unknown) => {
        logger.error(`Shutdown failed: ${String(err)}`);
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

bootstrap().catch((err: unknown) => {
  logger.fatal(`Failed to start: ${err instanceof Error ? err.stack ?? err.message : String(err)}`);
  process.exit(1);
});
