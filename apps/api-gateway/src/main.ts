import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { GLOBAL_PREFIX, configureApp } from './app.setup';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });

  configureApp(app);
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);

  // ── Start ─────────────────────────────────────────────
  const port = Number(configService.get<string>('API_GATEWAY_PORT', '4000'));
  await app.listen(port);

  logger.log(`🚀 API Gateway running on http://localhost:${port}/${GLOBAL_PREFIX}`);
}

bootstrap().catch((error: unknown) => {
  const message = error instanceof Error ? (error.stack ?? error.message) : String(error);
  new Logger('Bootstrap').error(`API Gateway failed to start: ${message}`);
  process.exit(1);
});
