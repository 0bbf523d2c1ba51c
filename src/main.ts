import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { LoggerService } from './common/logger/logger.service';
import { LoggingInterceptor } from './interceptors/logging.interceptor';
import { ResponseInterceptor } from './interceptors/response.interceptor';
import { GlobalExceptionFilter } from './common/exception-filters/global-exception.filter';

async function bootstrap() {
  // create() opens the connection; the health check and schema setup are
  // onModuleInit hooks run by listen(). Either failing exits the process
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
  });

  const logger: LoggerService = app.get(LoggerService);
  app.useLogger(logger);
  app.useGlobalInterceptors(
    new LoggingInterceptor(logger),
    new ResponseInterceptor(),
  );

  app.useGlobalFilters(new GlobalExceptionFilter(logger));
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));

  // SIGINT/SIGTERM: finish the in-flight ingestion cycle, then close Mongo
  app.enableShutdownHooks();

  const cfg = app.get(ConfigService);
  const port = cfg.get<number>('port') ?? 3000;
  await app.listen(port, '0.0.0.0');
  logger.log(`🚀  Listening on http://localhost:${port}`, 'Bootstrap');
}

bootstrap().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error('❌  Startup failed', err);
  process.exit(1);
});
