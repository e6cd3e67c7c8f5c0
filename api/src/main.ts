// Sentry instrumentation must load before any other module.
import './sentry/instrument';
import 'reflect-metadata';

import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import type { LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { NestExpressApplication } from '@nestjs/platform-express';
import compression from 'compression';
import helmet from 'helmet';
import { AppModule } from './app.module';
import { buildCorsOptions } from './common/cors';
import type { AppEnv } from './config/env.schema';
import { SentryExceptionFilter } from './sentry/sentry-exception.filter';
import { ThrottlerExceptionFilter } from './throttler/throttler-exception.filter';

async function bootstrap() {
  const isDebug = process.env.DEBUG === 'true';
  const logLevels: LogLevel[] = isDebug
    ? ['error', 'warn', 'log', 'debug', 'verbose']
    : ['error', 'warn', 'log'];

  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: logLevels,
  });
  const config = app.get<ConfigService<AppEnv, true>>(ConfigService);

  app.use(helmet());
  app.use(compression({ threshold: 1024 }));
  app.enableCors(buildCorsOptions(config.get('CORS_ORIGINS', { infer: true })));

  if (process.env.NODE_ENV === 'production') {
    app.getHttpAdapter().getInstance().set('trust proxy', 1);
  }

  // Global filters run in reverse order: throttling first, then Sentry.
  app.useGlobalFilters(
    new SentryExceptionFilter(),
    new ThrottlerExceptionFilter(),
  );
  app.enableShutdownHooks();

  const host = config.get('API_HOST', { infer: true });
  const port = config.get('API_PORT', { infer: true });
  await app.listen(port, host);
  new Logger('Bootstrap').log(`API listening on http://${host}:${port}`);
}
void bootstrap();
