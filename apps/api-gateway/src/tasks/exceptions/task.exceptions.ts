import { HttpException, HttpStatus } from '@nestjs/common';

/** Extensions accepted by POST /ocr/process */
export const ALLOWED_EXTENSIONS = ['png', 'jpg', 'jpeg', 'pdf', 'tif', 'tiff', 'webp'] as const;

export type AllowedExtension = (typeof ALLOWED_EXTENSIONS)[number];

export function isAllowedExtension(ext: string): ext is AllowedExtension {
  return ALLOWED_EXTENSIONS.some((allowed) => allowed === ext);
}

/**
 * Thrown when no file is attached to the upload request.
 * Maps to HTTP 400 Bad Request.
 */
export class MissingFileException extends HttpException {
  constructor() {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        code: 'NO_FILE',
        message: 'A file must be attached to the "file" multipart field',
      },
      HttpStatus.BAD_REQUEST,
    );
  }
}

/**
 * Thrown when the uploaded file's extension is not on the allowlist.
 * Maps to HTTP 415 Unsupported Media Type.
 */
export class UnsupportedFileTypeException extends HttpException {
  constructor(filename: string) {
    super(
      {
        statusCode: HttpStatus.UNSUPPORTED_MEDIA_TYPE,
        error: 'Unsupported Media Type',
        code: 'INVALID_FILE_TYPE',
        message: `File "${filename}" is not supported. Allowed types: ${ALLOWED_EXTENSIONS.join(', ')}`,
      },
      HttpStatus.UNSUPPORTED_MEDIA_TYPE,
    );
  }
}

/**
 * Thrown when the uploaded file exceeds UPLOAD_MAX_FILE_SIZE_MB.
 * Maps to HTTP 413 Content Too Large.
 */
export class FileTooLargeException extends HttpException {
  constructor(maxSizeMb: number) {
    super(
      {
        statusCode: HttpStatus.PAYLOAD_TOO_LARGE,
        error: 'Payload Too Large',
        code: 'FILE_TOO_LARGE',
        message: `File too large. Maximum size: ${maxSizeMb}MB`,
      },
      HttpStatus.PAYLOAD_TOO_LARGE,
    );
  }
}

/** Maps to HTTP 502: the object store rejected the upload. */
export class StorageUploadException extends HttpException {
  constructor(filename: string, cause: Error) {
    super(
      {
        statusCode: HttpStatus.BAD_GATEWAY,
        error: 'Bad Gateway',
        code: 'STORAGE_ERROR',
        message: `Failed to upload file "${filename}" to object storage`,
      },
      HttpStatus.BAD_GATEWAY,
      { cause },
    );
  }
}

export class TaskNotFoundException extends HttpException {
  constructor(taskId: string) {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        code: 'TASK_NOT_FOUND',
        message: `Task ${taskId} not found`,
      },
      HttpStatus.NOT_FOUND,
    );
  }
}

/** The task exists but belongs to another principal. */
export class TaskAccessDeniedException extends HttpException {
  constructor() {
    super(
      {
        statusCode: HttpStatus.FORBIDDEN,
        error: 'Forbidden',
        code: 'ACCESS_DENIED',
        message: 'Access denied',
      },
      HttpStatus.FORBIDDEN,
    );
  }
}

/**
 * GET /ocr/result on a failed task. Carries the stored pipeline error.
 * Maps to HTTP 422 Unprocessable Entity.
 */
export class TaskProcessingFailedException extends HttpException {
  constructor(error: string) {
    super(
      {
        statusCode: HttpStatus.UNPROCESSABLE_ENTITY,
        error: 'Unprocessable Entity',
        code: 'PROCESSING_FAILED',
        message: error || 'Processing failed',
      },
      HttpStatus.UNPROCESSABLE_ENTITY,
    );
  }
}

export class TaskResultsNotFoundException extends HttpException {
  constructor(taskId: string) {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        code: 'RESULTS_NOT_FOUND',
        message: `OCR results not found for task ${taskId}`,
      },
      HttpStatus.NOT_FOUND,
    );
  }
}

export class TaskFileNotFoundException extends HttpException {
  constructor(filename: string) {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        code: 'FILE_NOT_FOUND',
        message: `File "${filename}" not found`,
      },
      HttpStatus.NOT_FOUND,
    );
  }
}
