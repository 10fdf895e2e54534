import { Injectable, Logger } from '@nestjs/common';
import { ResultAggregator, TaskStatus, TaskStore, type Task } from '@invoice-ocr/tasks';
import { TaskDispatcher } from './task-dispatcher';
import { JobQueueClient, type JobPollResult } from './job-queue-client';

/**
 * Hands tasks to the external job queue and folds the job's outcome back
 * into the task when a client next reads it.
 *
 * Status therefore lags the worker until the next status/result request.
 */
@Injectable()
export class DelegatedTaskDispatcher extends TaskDispatcher {
  private readonly logger = new Logger(DelegatedTaskDispatcher.name);

  constructor(
    private readonly store: TaskStore,
    private readonly queue: JobQueueClient,
  ) {
    super();
  }

  async submit(task: Task): Promise<void> {
    const jobId = await this.queue.submit({
      taskId: task.id,
      storedFilename: task.filename,
      language: task.language,
      useAccelerator: task.useAccelerator,
    });
    await this.store.setExternalJobId(task.id, jobId);
    this.logger.log(`Task ${task.id} delegated as job ${jobId}`);
  }

  async reconcile(task: Task): Promise<Task> {
    if (task.status !== TaskStatus.PROCESSING || !task.externalJobId) {
      return task;
    }

    let outcome: JobPollResult;
    try {
      outcome = await this.queue.poll(task.externalJobId);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Polling job ${task.externalJobId} for task ${task.id} failed: ${message}`);
      return task;
    }

    switch (outcome.state) {
      case 'pending':
        return task;
      case 'success': {
        const result = ResultAggregator.aggregate(outcome.pages);
        await this.store.setResult(task.id, result);
        this.logger.log(`Task ${task.id} completed by job ${task.externalJobId}`);
        break;
      }
      case 'failure':
        await this.store.updateStatus(task.id, TaskStatus.FAILED, outcome.error || 'Delegated job failed');
        this.logger.error(`Task ${task.id} failed in job ${task.externalJobId}: ${outcome.error}`);
        break;
    }

    return (await this.store.get(task.id)) ?? task;
  }
}
