import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { MicroserviceOptions, Transport } from '@nestjs/microservices';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import {
  OCR_JOBS_LOADER_OPTIONS,
  OCR_JOBS_PACKAGE_NAME,
  OCR_JOBS_PROTO_PATH,
} from '@invoice-ocr/proto';
import { AppModule } from './app.module';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');

  // Create a hybrid application: HTTP for health checks + gRPC for jobs
  const app = await NestFactory.create(AppModule, {
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });
  app.enableShutdownHooks();

  const configService = app.get(ConfigService);

  const grpcHost = configService.get<string>('WORKER_GRPC_HOST', '0.0.0.0');
  const grpcPort = Number(configService.get<string>('WORKER_GRPC_PORT', '50051'));

  // ── gRPC Microservice ───────────────────────────────────
  app.connectMicroservice<MicroserviceOptions>({
    transport: Transport.GRPC,
    options: {
      package: OCR_JOBS_PACKAGE_NAME,
      protoPath: OCR_JOBS_PROTO_PATH,
      url: `${grpcHost}:${grpcPort}`,
      loader: OCR_JOBS_LOADER_OPTIONS,
    },
  });

  // Start all microservices, then the HTTP server for health checks
  await app.startAllMicroservices();

  const httpPort = Number(configService.get<string>('WORKER_HTTP_PORT', '50052'));
  await app.listen(httpPort);

  logger.log(`🔧 Worker gRPC server listening on ${grpcHost}:${grpcPort}`);
  logger.log(`💓 Worker health check on http://localhost:${httpPort}/health`);
}

bootstrap().catch((error: unknown) => {
  const message = error instanceof Error ? (error.stack ?? error.message) : String(error);
  new Logger('Bootstrap').error(`Worker failed to start: ${message}`);
  process.exit(1);
});
