// ── Domain types ────────────────────────────────────────────
export { TaskStatus, isTaskStatus } from './enums/task-status.enum';
export type { Task, NewTask, TaskResult } from './interfaces/task.interface';

// ── Errors ──────────────────────────────────────────────────
export {
  TaskRecordNotFoundError,
  IllegalTaskTransitionError,
  CorruptTaskResultError,
} from './errors/task.errors';

// ── State machine & aggregation ─────────────────────────────
export { TaskStateMachine } from './task-state-machine';
export type {
  TerminalWrite,
  TaskSnapshot,
  TransitionDecision,
} from './task-state-machine';
export { ResultAggregator, PAGE_SEPARATOR } from './result-aggregator';

// ── Store ───────────────────────────────────────────────────
export { TaskStore } from './task-store';
export type { TransitionOutcome } from './task-store';
export { InMemoryTaskStore } from './stores/in-memory-task-store';
export { RedisTaskStore } from './stores/redis-task-store';
export { TaskStoreModule, resolveTaskStoreDriver } from './task-store.module';
export type { TaskStoreDriver } from './task-store.module';
