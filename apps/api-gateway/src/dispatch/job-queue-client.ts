import type { PipelineJob } from '@invoice-ocr/pipeline';

export type JobSpec = PipelineJob;

export type JobPollResult =
  | { state: 'pending' }
  | { state: 'success'; pages: string[] }
  | { state: 'failure'; error: string };

/** External job queue used by the delegated dispatcher. */
export abstract class JobQueueClient {
  /** Enqueues the job and returns its id. */
  abstract submit(spec: JobSpec): Promise<string>;

  abstract poll(jobId: string): Promise<JobPollResult>;
}
