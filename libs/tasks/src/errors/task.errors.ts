/**
 * Domain errors raised by the task store and state machine.
 *
 * These are transport-agnostic; the api-gateway maps them to HTTP
 * exceptions where they can reach a client.
 */

export class TaskRecordNotFoundError extends Error {
  constructor(readonly taskId: string) {
    super(`Task ${taskId} does not exist`);
    this.name = 'TaskRecordNotFoundError';
  }
}

/** Raised when a write would break the PROCESSING → COMPLETED | FAILED graph. */
export class IllegalTaskTransitionError extends Error {
  constructor(
    readonly taskId: string,
    message: string,
  ) {
    super(`Illegal transition for task ${taskId}: ${message}`);
    this.name = 'IllegalTaskTransitionError';
  }
}

/** Raised when a stored result blob cannot be decoded. */
export class CorruptTaskResultError extends Error {
  constructor(readonly taskId: string) {
    super(`Stored result for task ${taskId} is malformed`);
    this.name = 'CorruptTaskResultError';
  }
}
