import { Controller } from '@nestjs/common';
import { GrpcMethod } from '@nestjs/microservices';
import {
  OCR_JOB_SERVICE_NAME,
  type GetJobRequest,
  type GetJobResponse,
  type SubmitJobRequest,
  type SubmitJobResponse,
} from '@invoice-ocr/proto';
import { OcrJobsService } from './ocr-jobs.service';

/**
 * gRPC controller for OcrJobService. Both RPCs are unary.
 */
@Controller()
export class OcrJobsController {
  constructor(private readonly ocrJobsService: OcrJobsService) {}

  @GrpcMethod(OCR_JOB_SERVICE_NAME, 'SubmitJob')
  submitJob(request: SubmitJobRequest): Promise<SubmitJobResponse> {
    return this.ocrJobsService.submitJob(request);
  }

  /** Unknown or expired job ids fail with NOT_FOUND. */
  @GrpcMethod(OCR_JOB_SERVICE_NAME, 'GetJob')
  getJob(request: GetJobRequest): Promise<GetJobResponse> {
    return this.ocrJobsService.getJob(request);
  }
}
