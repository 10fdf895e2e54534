import { Inject, Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ClientGrpc } from '@nestjs/microservices';
import { status as GrpcStatus } from '@grpc/grpc-js';
import { Observable, catchError, lastValueFrom, timeout } from 'rxjs';
import {
  OCR_JOB_SERVICE_NAME,
  WORKER_GRPC_CLIENT,
  type OcrJobServiceClient,
} from '@invoice-ocr/proto';
import { JobQueueClient, type JobPollResult, type JobSpec } from '../dispatch/job-queue-client';

/** Default timeout for unary gRPC calls (in milliseconds) */
const GRPC_UNARY_TIMEOUT_MS = 10_000;

function grpcCode(error: unknown): unknown {
  return error instanceof Error ? Reflect.get(error, 'code') : undefined;
}

/**
 * JobQueueClient over the worker's OcrJobService.
 *
 * Resolves the service stub on module init; the connection itself is opened
 * lazily by grpc-js on the first call.
 */
@Injectable()
export class GrpcJobQueueClient extends JobQueueClient implements OnModuleInit {
  private readonly logger = new Logger(GrpcJobQueueClient.name);
  private grpcService!: OcrJobServiceClient;

  constructor(
    @Inject(WORKER_GRPC_CLIENT)
    private readonly client: ClientGrpc,
  ) {
    super();
  }

  onModuleInit(): void {
    this.grpcService = this.client.getService<OcrJobServiceClient>(OCR_JOB_SERVICE_NAME);
    this.logger.log(`gRPC client initialized for ${OCR_JOB_SERVICE_NAME}`);
  }

  async submit(spec: JobSpec): Promise<string> {
    this.logger.debug(`Calling SubmitJob for task ${spec.taskId}`);

    const response = await this.call(`SubmitJob(${spec.taskId})`, this.grpcService.submitJob(spec));
    return response.jobId;
  }

  /** A job the worker no longer knows is reported as a failure. */
  async poll(jobId: string): Promise<JobPollResult> {
    try {
      const job = await this.call(`GetJob(${jobId})`, this.grpcService.getJob({ jobId }));

      switch (job.state) {
        case 'SUCCESS':
          return { state: 'success', pages: job.pageTexts };
        case 'FAILURE':
          return { state: 'failure', error: job.errorMessage };
        default:
          return { state: 'pending' };
      }
    } catch (error) {
      if (grpcCode(error) === GrpcStatus.NOT_FOUND) {
        return { state: 'failure', error: `Job ${jobId} is unknown to the worker` };
      }
      throw error;
    }
  }

  /** Applies a timeout so an unreachable worker cannot hang the caller. */
  private call<T>(label: string, source: Observable<T>): Promise<T> {
    return lastValueFrom(
      source.pipe(
        timeout(GRPC_UNARY_TIMEOUT_MS),
        catchError((error: Error) => {
          this.logger.error(`${label} failed: ${error.message}`);
          throw error;
        }),
      ),
    );
  }
}
