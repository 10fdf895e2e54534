import { Injectable, Logger, OnApplicationShutdown } from '@nestjs/common';
import { PipelineRunner } from '@invoice-ocr/pipeline';
import { StorageService } from '@invoice-ocr/storage';
import {
  TaskRecordNotFoundError,
  TaskStatus,
  TaskStore,
  type Task,
  type TaskResult,
  type TransitionOutcome,
} from '@invoice-ocr/tasks';
import { TaskDispatcher } from './task-dispatcher';

/**
 * Runs each task on a detached promise inside the gateway process.
 *
 * The run owns the task's single terminal write: setResult on success,
 * updateStatus(failed) on any stage error. A task deleted mid-run has its
 * late artifacts swept once that write finds the record gone. In-flight runs
 * are tracked so shutdown (and tests) can wait for them with drain().
 */
@Injectable()
export class InlineTaskDispatcher extends TaskDispatcher implements OnApplicationShutdown {
  private readonly logger = new Logger(InlineTaskDispatcher.name);
  private readonly inFlight = new Map<string, Promise<void>>();

  constructor(
    private readonly store: TaskStore,
    private readonly runner: PipelineRunner,
    private readonly storage: StorageService,
  ) {
    super();
  }

  async submit(task: Task): Promise<void> {
    // Fire-and-forget: the HTTP response does not wait for the pipeline
    const run = this.execute(task)
      .catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        this.logger.error(`Unhandled error in pipeline run for task ${task.id}: ${message}`);
      })
      .finally(() => this.inFlight.delete(task.id));

    this.inFlight.set(task.id, run);
    this.logger.log(`Task ${task.id} dispatched inline`);
  }

  async reconcile(task: Task): Promise<Task> {
    return task;
  }

  get pending(): number {
    return this.inFlight.size;
  }

  /** Waits for every run started so far. */
  async drain(): Promise<void> {
    await Promise.all([...this.inFlight.values()]);
  }

  async onApplicationShutdown(): Promise<void> {
    if (this.inFlight.size > 0) {
      this.logger.log(`Waiting for ${this.inFlight.size} pipeline run(s) to finish`);
      await this.drain();
    }
  }

  private async execute(task: Task): Promise<void> {
    let result: TaskResult;
    try {
      result = await this.runner.run({
        taskId: task.id,
        storedFilename: task.filename,
        language: task.language,
        useAccelerator: task.useAccelerator,
      });
    } catch (error) {
      const message = (error instanceof Error ? error.message : String(error)) || 'Pipeline failed';
      this.logger.error(`Task ${task.id} failed: ${message}`);
      await this.finish(task, () => this.store.updateStatus(task.id, TaskStatus.FAILED, message));
      return;
    }

    if (await this.finish(task, () => this.store.setResult(task.id, result))) {
      this.logger.log(`Task ${task.id} completed (${result.pagesProcessed} page(s))`);
    }
  }

  /** Returns false when the task was deleted while it ran. */
  private async finish(task: Task, write: () => Promise<TransitionOutcome>): Promise<boolean> {
    try {
      await write();
      return true;
    } catch (error) {
      if (!(error instanceof TaskRecordNotFoundError)) {
        throw error;
      }
    }

    this.logger.warn(`Task ${task.id} was deleted while running; removing its late artifacts`);
    await this.storage.deleteTaskFiles(task.filename);
    return false;
  }
}
