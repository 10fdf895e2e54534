/**
 * @invoice-ocr/proto
 *
 * Job-queue contract between the API gateway and the worker.
 *
 * - The proto file is consumed at runtime by @grpc/proto-loader
 * - TypeScript interfaces provide compile-time type safety
 * - gRPC exceptions provide a shared error contract
 */
import { join } from 'path';

// ── Proto File Paths ────────────────────────────────────

/** Absolute path to the OCR job queue proto file */
export const OCR_JOBS_PROTO_PATH: string = join(__dirname, 'ocr-jobs.proto');

// ── Package & Service Constants ─────────────────────────

/** gRPC package name matching the proto `package` directive */
export const OCR_JOBS_PACKAGE_NAME = 'invoiceocr';

export const OCR_JOB_SERVICE_NAME = 'OcrJobService';

/** NestJS injection token for the worker gRPC client */
export const WORKER_GRPC_CLIENT = 'WORKER_GRPC_CLIENT';

/** Must be identical on client and server so enums travel as names */
export const OCR_JOBS_LOADER_OPTIONS = {
  keepCase: false,
  longs: String,
  enums: String,
  defaults: true,
  arrays: true,
};

// ── TypeScript Interfaces ───────────────────────────────

export { isJobState } from './interfaces';
export type {
  JobState,
  SubmitJobRequest,
  SubmitJobResponse,
  GetJobRequest,
  GetJobResponse,
  OcrJobServiceClient,
} from './interfaces';

// ── gRPC Exceptions ─────────────────────────────────────

export {
  GrpcNotFoundException,
  GrpcInvalidArgumentException,
} from './grpc-exceptions';
