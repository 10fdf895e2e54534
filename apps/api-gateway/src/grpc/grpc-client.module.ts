import { Module } from '@nestjs/common';
import { ClientsModule, Transport } from '@nestjs/microservices';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  OCR_JOBS_LOADER_OPTIONS,
  OCR_JOBS_PACKAGE_NAME,
  OCR_JOBS_PROTO_PATH,
  WORKER_GRPC_CLIENT,
} from '@invoice-ocr/proto';
import { JobQueueClient } from '../dispatch/job-queue-client';
import { GrpcJobQueueClient } from './grpc-job-queue.client';

/**
 * Configures the gRPC connection to the worker and provides it as the
 * JobQueueClient. Only the delegated dispatcher talks to it.
 *
 * The target address comes from WORKER_GRPC_HOST / WORKER_GRPC_PORT.
 */
@Module({
  imports: [
    ClientsModule.registerAsync([
      {
        name: WORKER_GRPC_CLIENT,
        imports: [ConfigModule],
        inject: [ConfigService],
        useFactory: (configService: ConfigService) => ({
          transport: Transport.GRPC,
          options: {
            package: OCR_JOBS_PACKAGE_NAME,
            protoPath: OCR_JOBS_PROTO_PATH,
            loader: OCR_JOBS_LOADER_OPTIONS,
            url: `${configService.get<string>('WORKER_GRPC_HOST', 'localhost')}:${configService.get<string>('WORKER_GRPC_PORT', '50051')}`,
          },
        }),
      },
    ]),
  ],
  providers: [{ provide: JobQueueClient, useClass: GrpcJobQueueClient }],
  exports: [JobQueueClient],
})
export class GrpcClientModule {}
