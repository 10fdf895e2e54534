import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { PipelineRunner, isRecognitionLanguage } from '@invoice-ocr/pipeline';
import {
  GrpcInvalidArgumentException,
  GrpcNotFoundException,
  type GetJobRequest,
  type GetJobResponse,
  type SubmitJobRequest,
  type SubmitJobResponse,
} from '@invoice-ocr/proto';
import { JobRegistry } from './job-registry';

/**
 * OcrJobsService - gRPC server side of the delegated job queue.
 *
 * 1. submitJob() - validate, record the job as PENDING, start the pipeline
 *                  on a detached promise, answer with the job id at once
 * 2. getJob()    - read the record back for the gateway's reconcile step
 *
 * The pipeline run writes the job's single terminal state. In-flight runs
 * are tracked so shutdown can wait for them.
 */
@Injectable()
export class OcrJobsService implements OnApplicationShutdown {
  private readonly logger = new Logger(OcrJobsService.name);
  private readonly inFlight = new Map<string, Promise<void>>();

  constructor(
    private readonly registry: JobRegistry,
    private readonly runner: PipelineRunner,
  ) {}

  // ── Public gRPC-facing methods ───────────────────────────

  async submitJob(request: SubmitJobRequest): Promise<SubmitJobResponse> {
    if (!request.taskId || !request.storedFilename) {
      throw new GrpcInvalidArgumentException('task_id and stored_filename are required');
    }
    if (!isRecognitionLanguage(request.language)) {
      throw new GrpcInvalidArgumentException(`Unsupported language "${request.language}"`);
    }

    const job = await this.registry.create(request.taskId);
    this.logger.log(`Job ${job.jobId} accepted for task ${request.taskId}`);

    // Fire-and-forget: the caller polls GetJob for the outcome
    const run = this.execute(job.jobId, request)
      .catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.error(`Unhandled error in job ${job.jobId}: ${message}`);
      })
      .finally(() => this.inFlight.delete(job.jobId));
    this.inFlight.set(job.jobId, run);

    return { jobId: job.jobId, state: job.state };
  }

  async getJob(request: GetJobRequest): Promise<GetJobResponse> {
    const job = await this.registry.get(request.jobId);
    if (!job) {
      throw new GrpcNotFoundException(`Job ${request.jobId} not found`);
    }

    return {
      jobId: job.jobId,
      state: job.state,
      pageTexts: job.pageTexts,
      errorMessage: job.errorMessage,
    };
  }

  /** Waits for every run started so far. */
  async drain(): Promise<void> {
    await Promise.all([...this.inFlight.values()]);
  }

  async onApplicationShutdown(): Promise<void> {
    if (this.inFlight.size > 0) {
      this.logger.log(`Waiting for ${this.inFlight.size} job(s) to finish`);
      await this.drain();
    }
  }

  // ── Private processing logic ─────────────────────────────

  private async execute(jobId: string, request: SubmitJobRequest): Promise<void> {
    let pages: string[];
    try {
      const result = await this.runner.run({
        taskId: request.taskId,
        storedFilename: request.storedFilename,
        language: request.language,
        useAccelerator: request.useAccelerator,
      });
      pages = result.pages;
    } catch (error) {
      const message = (error instanceof Error ? error.message : String(error)) || 'Pipeline failed';
      this.logger.error(`Job ${jobId} failed: ${message}`);
      await this.registry.fail(jobId, message);
      return;
    }

    await this.registry.complete(jobId, pages);
    this.logger.log(`Job ${jobId} succeeded (${pages.length} page(s))`);
  }
}
