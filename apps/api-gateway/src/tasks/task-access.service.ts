import { Injectable, Logger } from '@nestjs/common';
import { TaskStore, type Task } from '@invoice-ocr/tasks';
import { TaskAccessDeniedException, TaskNotFoundException } from './exceptions/task.exceptions';

/**
 * Ownership check shared by every per-task route (status, result, extract,
 * download, delete). Existence is checked before ownership, so an unknown
 * id is always a 404 whoever asks.
 */
@Injectable()
export class TaskAccessService {
  private readonly logger = new Logger(TaskAccessService.name);

  constructor(private readonly store: TaskStore) {}

  /**
   * @throws TaskNotFoundException if the task does not exist
   * @throws TaskAccessDeniedException if it belongs to another principal
   */
  async loadOwnedTask(taskId: string, requester: string): Promise<Task> {
    const task = await this.store.get(taskId);
    if (!task) {
      throw new TaskNotFoundException(taskId);
    }

    if (task.owner !== requester) {
      this.logger.warn(`Principal "${requester}" denied access to task ${taskId}`);
      throw new TaskAccessDeniedException();
    }

    return task;
  }
}
