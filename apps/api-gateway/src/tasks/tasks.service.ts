import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { Readable } from 'stream';
import { StorageService, extensionOf, isDerivedArtifact } from '@invoice-ocr/storage';
import { TaskStatus, TaskStore, type Task } from '@invoice-ocr/tasks';
import { TaskDispatcher } from '../dispatch/task-dispatcher';
import { TaskAccessService } from './task-access.service';
import { ProcessDocumentDto } from './dto/process-document.dto';
import { ListTasksQueryDto, MAX_PER_PAGE } from './dto/list-tasks-query.dto';
import type {
  ProcessAcceptedResponse,
  TaskDeletedResponse,
  TaskListItem,
  TaskListResponse,
  TaskPendingResponse,
  TaskResultResponse,
  TaskStatusResponse,
} from './dto/task-responses.dto';
import {
  FileTooLargeException,
  MissingFileException,
  StorageUploadException,
  TaskFileNotFoundException,
  TaskProcessingFailedException,
  TaskResultsNotFoundException,
  UnsupportedFileTypeException,
  isAllowedExtension,
} from './exceptions/task.exceptions';

const BYTES_PER_MB = 1024 * 1024;

export type TaskResultView =
  | { kind: 'pending'; body: TaskPendingResponse }
  | { kind: 'completed'; body: TaskResultResponse };

/**
 * TasksService - the task lifecycle as seen over HTTP.
 *
 * Upload path:
 *   1. Validate file (presence, extension, size); nothing is stored on failure
 *   2. Upload the bytes under a fresh stored filename
 *   3. Create the task, already in "processing"
 *   4. Hand it to the dispatcher; if scheduling throws, fail the task at once
 *
 * Every per-task read goes through TaskAccessService first, and status and
 * result reads reconcile with the dispatcher before answering.
 */
@Injectable()
export class TasksService {
  private readonly logger = new Logger(TasksService.name);
  private readonly maxFileSizeMb: number;

  constructor(
    private readonly store: TaskStore,
    private readonly dispatcher: TaskDispatcher,
    private readonly access: TaskAccessService,
    private readonly storage: StorageService,
    configService: ConfigService,
  ) {
    const configured = Number(configService.get<string>('UPLOAD_MAX_FILE_SIZE_MB', '50'));
    this.maxFileSizeMb = Number.isFinite(configured) && configured > 0 ? configured : 50;
  }

  async submit(
    file: Express.Multer.File | undefined,
    dto: ProcessDocumentDto,
    owner: string,
  ): Promise<ProcessAcceptedResponse> {
    const upload = this.validateFile(file);

    let storedFilename: string;
    try {
      storedFilename = await this.storage.uploadFile(upload.buffer, upload.originalname, upload.mimetype);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      this.logger.error(`Upload of "${upload.originalname}" failed: ${cause.message}`);
      throw new StorageUploadException(upload.originalname, cause);
    }

    const taskId = await this.store.create({
      owner,
      filename: storedFilename,
      originalFilename: upload.originalname,
      language: dto.language,
      useAccelerator: dto.use_gpu,
    });
    this.logger.log(`Task ${taskId} created for "${owner}" (${storedFilename})`);

    const task = await this.store.get(taskId);
    let status = TaskStatus.PROCESSING;
    try {
      if (!task) {
        throw new Error(`task ${taskId} vanished before dispatch`);
      }
      await this.dispatcher.submit(task);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Dispatch of task ${taskId} failed: ${message}`);
      await this.store.updateStatus(taskId, TaskStatus.FAILED, `Failed to start processing: ${message}`);
      status = TaskStatus.FAILED;
    }

    return {
      task_id: taskId,
      status,
      message: status === TaskStatus.PROCESSING ? 'OCR processing started' : 'Failed to start processing',
    };
  }

  async getStatus(taskId: string, requester: string): Promise<TaskStatusResponse> {
    const task = await this.loadReconciled(taskId, requester);

    return {
      task_id: task.id,
      status: task.status,
      created_at: task.createdAt,
      error_message: task.error,
    };
  }

  /** @throws TaskProcessingFailedException when the task failed */
  async getResult(taskId: string, requester: string): Promise<TaskResultView> {
    const task = await this.loadReconciled(taskId, requester);

    if (task.status === TaskStatus.PROCESSING) {
      return {
        kind: 'pending',
        body: { task_id: task.id, status: task.status, message: 'Task is still processing' },
      };
    }

    if (task.status === TaskStatus.FAILED) {
      throw new TaskProcessingFailedException(task.error ?? '');
    }

    const result = await this.store.getResult(task.id);
    if (!result) {
      throw new TaskResultsNotFoundException(task.id);
    }

    return {
      kind: 'completed',
      body: {
        task_id: task.id,
        status: task.status,
        results: {
          detected_texts: result.pages,
          all_text: result.fullText,
          pages_processed: result.pagesProcessed,
        },
      },
    };
  }

  async list(owner: string, query: ListTasksQueryDto): Promise<TaskListResponse> {
    const page = query.page;
    const perPage = Math.min(query.per_page, MAX_PER_PAGE);

    const tasks = await this.store.list(owner, query.status);
    const total = tasks.length;
    const pages = Math.ceil(total / perPage);
    const start = (page - 1) * perPage;

    return {
      data: tasks.slice(start, start + perPage).map(toListItem),
      pagination: {
        page,
        per_page: perPage,
        total,
        pages,
        has_next: page < pages,
        has_prev: page > 1,
      },
    };
  }

  /** Removes the record, its result and every stored file. */
  async delete(taskId: string, requester: string): Promise<TaskDeletedResponse> {
    const task = await this.access.loadOwnedTask(taskId, requester);

    await this.storage.deleteTaskFiles(task.filename);
    await this.store.delete(task.id);

    this.logger.log(`Task ${task.id} deleted by "${requester}"`);
    return { task_id: task.id, message: 'Task deleted successfully' };
  }

  /**
   * Opens one of the task's derived artifacts. Names that are not artifacts
   * of this task are reported as missing.
   */
  async openArtifact(taskId: string, filename: string, requester: string): Promise<Readable> {
    const task = await this.access.loadOwnedTask(taskId, requester);

    if (!isDerivedArtifact(task.filename, filename)) {
      throw new TaskFileNotFoundException(filename);
    }

    const stream = await this.storage.openArtifact(filename);
    if (!stream) {
      throw new TaskFileNotFoundException(filename);
    }
    return stream;
  }

  // ── Private methods ──────────────────────────────────────

  private async loadReconciled(taskId: string, requester: string): Promise<Task> {
    const task = await this.access.loadOwnedTask(taskId, requester);
    return this.dispatcher.reconcile(task);
  }

  private validateFile(file: Express.Multer.File | undefined): Express.Multer.File {
    if (!file || !file.originalname || !file.buffer || file.size === 0) {
      throw new MissingFileException();
    }

    if (!isAllowedExtension(extensionOf(file.originalname))) {
      throw new UnsupportedFileTypeException(file.originalname);
    }

    if (file.size > this.maxFileSizeMb * BYTES_PER_MB) {
      throw new FileTooLargeException(this.maxFileSizeMb);
    }

    return file;
  }
}

function toListItem(task: Task): TaskListItem {
  return {
    task_id: task.id,
    status: task.status,
    filename: task.filename,
    original_filename: task.originalFilename,
    language: task.language,
    created_at: task.createdAt,
    finished_at: task.finishedAt,
    error_message: task.error,
  };
}
