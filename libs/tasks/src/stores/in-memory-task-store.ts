import { Injectable, Logger } from '@nestjs/common';
import { TaskStatus } from '../enums/task-status.enum';
import { TaskRecordNotFoundError } from '../errors/task.errors';
import type { NewTask, Task, TaskResult } from '../interfaces/task.interface';
import { generateTaskId } from '../task-id';
import { TaskStateMachine, type TerminalWrite } from '../task-state-machine';
import { TaskStore, type TransitionOutcome } from '../task-store';

interface TaskEntry {
  task: Task;
  result: TaskResult | null;
}

/**
 * InMemoryTaskStore - single-process TaskStore backed by a Map.
 *
 * Suitable for one gateway instance with inline dispatch. Every operation
 * runs synchronously between awaits, so each write is atomic with respect
 * to the event loop. Callers always receive copies.
 */
@Injectable()
export class InMemoryTaskStore extends TaskStore {
  private readonly logger = new Logger(InMemoryTaskStore.name);
  private readonly entries = new Map<string, TaskEntry>();

  async create(meta: NewTask): Promise<string> {
    const id = generateTaskId();
    const task: Task = {
      id,
      owner: meta.owner,
      status: TaskStateMachine.INITIAL_STATUS,
      filename: meta.filename,
      originalFilename: meta.originalFilename,
      language: meta.language,
      useAccelerator: meta.useAccelerator,
      createdAt: new Date().toISOString(),
      finishedAt: null,
      error: null,
      externalJobId: null,
    };

    this.entries.set(id, { task, result: null });
    this.logger.debug(`Created task ${id} for owner ${meta.owner}`);
    return id;
  }

  async get(id: string): Promise<Task | null> {
    const entry = this.entries.get(id);
    return entry ? { ...entry.task } : null;
  }

  async updateStatus(
    id: string,
    status: TaskStatus,
    error?: string,
  ): Promise<TransitionOutcome> {
    return this.transition(id, TaskStateMachine.statusWrite(id, status, error));
  }

  async setResult(id: string, result: TaskResult): Promise<TransitionOutcome> {
    return this.transition(id, { status: TaskStatus.COMPLETED, result });
  }

  async getResult(id: string): Promise<TaskResult | null> {
    const result = this.entries.get(id)?.result;
    return result ? { ...result, pages: [...result.pages] } : null;
  }

  async setExternalJobId(id: string, jobId: string): Promise<void> {
    this.requireEntry(id).task.externalJobId = jobId;
  }

  async delete(id: string): Promise<boolean> {
    return this.entries.delete(id);
  }

  async list(owner: string, status?: TaskStatus): Promise<Task[]> {
    return [...this.entries.values()]
      .map((entry) => entry.task)
      .filter((task) => task.owner === owner)
      .filter((task) => status === undefined || task.status === status)
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .map((task) => ({ ...task }));
  }

  // ── Private helpers ──────────────────────────────────────

  private transition(id: string, write: TerminalWrite): TransitionOutcome {
    const entry = this.requireEntry(id);
    const decision = TaskStateMachine.evaluate(
      id,
      {
        status: entry.task.status,
        error: entry.task.error,
        result: entry.result,
      },
      write,
    );

    if (decision === 'noop') {
      return 'unchanged';
    }

    const finishedAt = new Date().toISOString();
    if (write.status === TaskStatus.COMPLETED) {
      entry.result = { ...write.result, pages: [...write.result.pages] };
      entry.task = { ...entry.task, status: write.status, error: null, finishedAt };
    } else {
      entry.result = null;
      entry.task = {
        ...entry.task,
        status: write.status,
        error: write.error,
        finishedAt,
      };
    }

    return 'applied';
  }

  private requireEntry(id: string): TaskEntry {
    const entry = this.entries.get(id);
    if (!entry) {
      throw new TaskRecordNotFoundError(id);
    }
    return entry;
  }
}
