/**
 * Lifecycle status of an OCR task.
 *
 * Transitions:
 *   PROCESSING → COMPLETED
 *              → FAILED
 *
 * Both terminal states are final. A failed task is never retried; the client
 * submits a new task instead.
 */
export enum TaskStatus {
  /** Task accepted and its pipeline scheduled (set at creation) */
  PROCESSING = 'processing',

  /** Pipeline finished; a Result is stored for the task */
  COMPLETED = 'completed',

  /** Pipeline or scheduling failed; see Task.error for details */
  FAILED = 'failed',
}

const TASK_STATUS_VALUES: readonly string[] = Object.values(TaskStatus);

export function isTaskStatus(value: unknown): value is TaskStatus {
  return typeof value === 'string' && TASK_STATUS_VALUES.includes(value);
}
