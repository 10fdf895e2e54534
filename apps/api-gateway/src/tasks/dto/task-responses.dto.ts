import type { TaskStatus } from '@invoice-ocr/tasks';

/** POST /ocr/process - 202 Accepted */
export interface ProcessAcceptedResponse {
  task_id: string;
  status: TaskStatus;
  message: string;
}

export interface TaskStatusResponse {
  task_id: string;
  status: TaskStatus;
  created_at: string;
  error_message: string | null;
}

/** GET /ocr/result while the task is still processing - 202 Accepted */
export interface TaskPendingResponse {
  task_id: string;
  status: TaskStatus;
  message: string;
}

export interface TaskResultResponse {
  task_id: string;
  status: TaskStatus;
  results: {
    detected_texts: string[];
    all_text: string;
    pages_processed: number;
  };
}

export interface TaskListItem {
  task_id: string;
  status: TaskStatus;
  filename: string;
  original_filename: string;
  language: string;
  created_at: string;
  finished_at: string | null;
  error_message: string | null;
}

export interface Pagination {
  page: number;
  per_page: number;
  total: number;
  pages: number;
  has_next: boolean;
  has_prev: boolean;
}

export interface TaskListResponse {
  data: TaskListItem[];
  pagination: Pagination;
}

export interface TaskDeletedResponse {
  task_id: string;
  message: string;
}
