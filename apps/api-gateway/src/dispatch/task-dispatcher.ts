import type { Task } from '@invoice-ocr/tasks';

/**
 * Runs the OCR pipeline for a task, either in this process or on the
 * external job queue. The strategy is picked once, from DISPATCH_MODE.
 */
export abstract class TaskDispatcher {
  /** Resolves once the run is scheduled, not when it finishes. */
  abstract submit(task: Task): Promise<void>;

  /**
   * Brings a task up to date with work happening elsewhere and returns the
   * current record. Called from the status and result read paths.
   */
  abstract reconcile(task: Task): Promise<Task>;
}
