import 'reflect-metadata';

import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';

import { AppModule } from './app.module';
import { buildLoggerOptions } from './utils/request-logger';
import { resolveTrustProxy } from './utils/trust-proxy';

async function bootstrap(): Promise<void> {
  const adapter = new FastifyAdapter({
    logger: buildLoggerOptions(process.env.LOG_LEVEL ?? 'info'),
    // request.ip, and so the rate-limit client key, comes from X-Forwarded-For only behind a trusted proxy.
    trustProxy: resolveTrustProxy(process.env.TRUST_PROXY),
  });

  const app = await NestFactory.create<NestFastifyApplication>(AppModule, adapter, {
    logger: new Logger(),
  });
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);
  const port = Number(configService.get('PORT') ?? 3000);

  await app.listen(port, '0.0.0.0');
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
