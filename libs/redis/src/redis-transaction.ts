/** Reply of ioredis `multi().exec()` / `pipeline().exec()`; null when a WATCH aborted it. */
export type ExecResult = [error: Error | null, result: unknown][] | null;

/**
 * ioredis resolves exec() even when single commands fail, reporting each
 * failure in the reply array. Throws the first such error.
 */
export function assertCommitted(results: ExecResult, operation: string): void {
  if (!results) {
    throw new Error(`Redis transaction aborted: ${operation}`);
  }
  for (const [error] of results) {
    if (error) {
      throw error;
    }
  }
}
