import { TaskStatus } from './enums/task-status.enum';
import type { NewTask, Task, TaskResult } from './interfaces/task.interface';

/**
 * - applied:   the store moved the task to the requested terminal state
 * - unchanged: the task already held that terminal state and payload
 */
export type TransitionOutcome = 'applied' | 'unchanged';

/**
 * TaskStore - durable record of task metadata and results.
 *
 * Declared as an abstract class so it doubles as the Nest injection token.
 * Implementations:
 *   - RedisTaskStore     - hash + result blob + per-owner index in Redis
 *   - InMemoryTaskStore  - single-process Map, for small deployments and tests
 *
 * Contract:
 *   - Each status/error/result write is atomic as a unit
 *   - Terminal writes are validated by TaskStateMachine; repeating the same
 *     terminal write is a no-op, any other write to a terminal task throws
 *     IllegalTaskTransitionError
 *   - delete() removes metadata and Result together
 */
export abstract class TaskStore {
  /** Creates a PROCESSING task and returns its generated id. */
  abstract create(meta: NewTask): Promise<string>;

  /** Returns null when the task does not exist. */
  abstract get(id: string): Promise<Task | null>;

  /**
   * Moves a task to FAILED with `error`. COMPLETED must go through
   * setResult() so that a Result is always written with it.
   *
   * @throws TaskRecordNotFoundError, IllegalTaskTransitionError
   */
  abstract updateStatus(
    id: string,
    status: TaskStatus,
    error?: string,
  ): Promise<TransitionOutcome>;

  /**
   * Stores `result` and moves the task to COMPLETED in one write.
   *
   * @throws TaskRecordNotFoundError, IllegalTaskTransitionError
   */
  abstract setResult(id: string, result: TaskResult): Promise<TransitionOutcome>;

  /** Returns null unless the task is COMPLETED. */
  abstract getResult(id: string): Promise<TaskResult | null>;

  /** @throws TaskRecordNotFoundError */
  abstract setExternalJobId(id: string, jobId: string): Promise<void>;

  /** Returns false when there was nothing to delete. */
  abstract delete(id: string): Promise<boolean>;

  /** Tasks owned by `owner`, newest first. */
  abstract list(owner: string, status?: TaskStatus): Promise<Task[]>;
}
