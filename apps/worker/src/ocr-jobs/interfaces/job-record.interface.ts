import type { JobState } from '@invoice-ocr/proto';

export interface JobRecord {
  jobId: string;
  taskId: string;
  state: JobState;
  /** Recognized text per page; empty until SUCCESS */
  pageTexts: string[];
  /** Empty unless FAILURE */
  errorMessage: string;
  createdAt: string;
  updatedAt: string;
}
