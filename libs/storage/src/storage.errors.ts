/** Raised when the object store rejects or fails an operation. */
export class StorageOperationError extends Error {
  constructor(
    readonly operation: string,
    readonly key: string,
    cause: unknown,
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Storage ${operation} failed for "${key}": ${reason}`, { cause });
    this.name = 'StorageOperationError';
  }
}

export class StorageObjectNotFoundError extends Error {
  constructor(readonly key: string) {
    super(`Object "${key}" does not exist`);
    this.name = 'StorageObjectNotFoundError';
  }
}
