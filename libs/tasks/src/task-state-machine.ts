import { TaskStatus } from './enums/task-status.enum';
import { IllegalTaskTransitionError } from './errors/task.errors';
import type { TaskResult } from './interfaces/task.interface';

/** A terminal write requested by a dispatcher or reconcile call. */
export type TerminalWrite =
  | { status: TaskStatus.COMPLETED; result: TaskResult }
  | { status: TaskStatus.FAILED; error: string };

/** What a store currently holds for a task, as far as transitions care. */
export interface TaskSnapshot {
  status: TaskStatus;
  error: string | null;
  result: TaskResult | null;
}

/**
 * - apply: the task is PROCESSING and the write moves it to a terminal state
 * - noop:  the task already holds exactly this terminal state and payload
 */
export type TransitionDecision = 'apply' | 'noop';

/**
 * TaskStateMachine - the only place that decides whether a status write is
 * legal. Every TaskStore implementation consults it before writing.
 *
 * States:
 *   PROCESSING (initial) → COMPLETED (requires a Result)
 *                        → FAILED    (requires a non-empty error)
 *
 * There is no retry edge and no way back to PROCESSING.
 */
export class TaskStateMachine {
  static readonly INITIAL_STATUS = TaskStatus.PROCESSING;

  static isTerminal(status: TaskStatus): boolean {
    return status === TaskStatus.COMPLETED || status === TaskStatus.FAILED;
  }

  /**
   * Decides how a store should handle `write` against `current`.
   *
   * Re-writing the same terminal status with the same payload is a no-op so
   * that a late duplicate writer cannot corrupt state.
   *
   * @throws IllegalTaskTransitionError for every other write
   */
  static evaluate(
    taskId: string,
    current: TaskSnapshot,
    write: TerminalWrite,
  ): TransitionDecision {
    TaskStateMachine.assertPayload(taskId, write);

    if (current.status === TaskStatus.PROCESSING) {
      return 'apply';
    }

    if (current.status !== write.status) {
      throw new IllegalTaskTransitionError(
        taskId,
        `${current.status} is terminal and cannot become ${write.status}`,
      );
    }

    const samePayload =
      write.status === TaskStatus.COMPLETED
        ? current.result !== null && sameResult(current.result, write.result)
        : current.error === write.error;

    if (!samePayload) {
      throw new IllegalTaskTransitionError(
        taskId,
        `already ${current.status} with a different payload`,
      );
    }

    return 'noop';
  }

  /**
   * Builds the terminal write for a plain status update.
   * COMPLETED is only reachable through a Result, never through a bare status.
   */
  static statusWrite(
    taskId: string,
    status: TaskStatus,
    error?: string,
  ): TerminalWrite {
    if (status === TaskStatus.FAILED) {
      return { status, error: error ?? '' };
    }

    if (status === TaskStatus.COMPLETED) {
      throw new IllegalTaskTransitionError(
        taskId,
        'completed requires a result; use setResult()',
      );
    }

    throw new IllegalTaskTransitionError(
      taskId,
      `${status} is only assigned at creation`,
    );
  }

  private static assertPayload(taskId: string, write: TerminalWrite): void {
    if (write.status === TaskStatus.FAILED && write.error.trim() === '') {
      throw new IllegalTaskTransitionError(
        taskId,
        'failed requires a non-empty error',
      );
    }

    if (
      write.status === TaskStatus.COMPLETED &&
      write.result.pages.length !== write.result.pagesProcessed
    ) {
      throw new IllegalTaskTransitionError(
        taskId,
        `result reports ${write.result.pagesProcessed} pages but carries ${write.result.pages.length}`,
      );
    }
  }
}

function sameResult(a: TaskResult, b: TaskResult): boolean {
  return (
    a.pagesProcessed === b.pagesProcessed &&
    a.fullText === b.fullText &&
    a.pages.every((page, index) => page === b.pages[index])
  );
}
