/**
 * TypeScript interfaces mirroring ocr-jobs.proto.
 *
 * @grpc/proto-loader parses the proto at runtime with camelCase field names
 * and string enums (see OCR_JOBS_LOADER_OPTIONS); these types give both
 * sides compile-time safety on that shape.
 */
import { Observable } from 'rxjs';

export type JobState = 'PENDING' | 'SUCCESS' | 'FAILURE';

const JOB_STATES: readonly JobState[] = ['PENDING', 'SUCCESS', 'FAILURE'];

export function isJobState(value: unknown): value is JobState {
  return JOB_STATES.some((state) => state === value);
}

// ── Request / Response Interfaces ───────────────────────

export interface SubmitJobRequest {
  taskId: string;
  storedFilename: string;
  language: string;
  useAccelerator: boolean;
}

export interface SubmitJobResponse {
  jobId: string;
  state: JobState;
}

export interface GetJobRequest {
  jobId: string;
}

export interface GetJobResponse {
  jobId: string;
  state: JobState;
  pageTexts: string[];
  errorMessage: string;
}

// ── Service Client Interface ────────────────────────────
// Matches the gRPC service definition for use with NestJS ClientGrpc

export interface OcrJobServiceClient {
  submitJob(request: SubmitJobRequest): Observable<SubmitJobResponse>;

  getJob(request: GetJobRequest): Observable<GetJobResponse>;
}
