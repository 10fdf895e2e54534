import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Thrown when extraction is requested before the task has completed.
 * Maps to HTTP 400 Bad Request.
 */
export class TaskNotCompletedException extends HttpException {
  constructor() {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        code: 'TASK_NOT_COMPLETED',
        message: 'Task not completed yet',
      },
      HttpStatus.BAD_REQUEST,
    );
  }
}

export class PageOutOfRangeException extends HttpException {
  constructor(pageNumber: number, totalPages: number) {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        code: 'PAGE_OUT_OF_RANGE',
        message: `Page ${pageNumber} is out of range (task has ${totalPages} page(s))`,
      },
      HttpStatus.BAD_REQUEST,
    );
  }
}

/**
 * Thrown when a single requested page could not be extracted.
 * Maps to HTTP 502 Bad Gateway.
 */
export class ExtractionFailedException extends HttpException {
  constructor(reason: string) {
    super(
      {
        statusCode: HttpStatus.BAD_GATEWAY,
        error: 'Bad Gateway',
        code: 'EXTRACTION_FAILED',
        message: `Extraction failed: ${reason}`,
      },
      HttpStatus.BAD_GATEWAY,
    );
  }
}
