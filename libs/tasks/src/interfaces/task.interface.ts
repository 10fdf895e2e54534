import { TaskStatus } from '../enums/task-status.enum';

/**
 * Task - one document's end-to-end pipeline run and its tracked state.
 *
 * Invariants:
 * - id and owner never change after creation
 * - error is set only when status === FAILED
 * - a Result is stored only when status === COMPLETED
 * - finishedAt is set by the single terminal transition
 */
export interface Task {
  id: string;
  owner: string;
  status: TaskStatus;

  /** Stored filename of the upload (never an absolute path) */
  filename: string;
  originalFilename: string;

  language: string;
  useAccelerator: boolean;

  /** ISO 8601 UTC */
  createdAt: string;
  finishedAt: string | null;

  error: string | null;

  /** Job id returned by the external job queue (delegated dispatch only) */
  externalJobId: string | null;
}

/** Metadata supplied by the ingest path when a task is created. */
export interface NewTask {
  owner: string;
  filename: string;
  originalFilename: string;
  language: string;
  useAccelerator: boolean;
}

/**
 * Canonical output of a completed pipeline run.
 *
 * pages[i] is the recognized text of page i + 1; fullText is the pages
 * joined by "\n" in order.
 */
export interface TaskResult {
  pages: string[];
  fullText: string;
  pagesProcessed: number;
}
