import { INestApplication, ValidationPipe } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

export const GLOBAL_PREFIX = 'api/v1';

export function createValidationPipe(): ValidationPipe {
  return new ValidationPipe({
    whitelist: true,
    forbidNonWhitelisted: true,
    transform: true,
    transformOptions: {
      enableImplicitConversion: true,
    },
  });
}

/**
 * Applies the HTTP pipeline shared by main.ts and the e2e tests:
 * global prefix, validation and CORS.
 */
export function configureApp(app: INestApplication): void {
  const configService = app.get(ConfigService);

  app.setGlobalPrefix(GLOBAL_PREFIX);

  // ── Global Pipes ──────────────────────────────────────
  app.useGlobalPipes(createValidationPipe());

  // ── CORS ──────────────────────────────────────────────
  const corsOrigin = configService.get<string>('API_GATEWAY_CORS_ORIGIN', 'http://localhost:3000');
  app.enableCors({
    origin: corsOrigin,
    credentials: true,
  });
}
