import type { TaskResult } from './interfaces/task.interface';

/** Separator placed between page texts in TaskResult.fullText */
export const PAGE_SEPARATOR = '\n';

/**
 * ResultAggregator - merges per-page recognition output into the single
 * Result that is persisted for a task.
 *
 * Deterministic: the same page list always yields the same Result, which is
 * what lets a late duplicate terminal write be recognised as a no-op.
 */
export class ResultAggregator {
  static aggregate(pageTexts: readonly string[]): TaskResult {
    const pages = [...pageTexts];
    return {
      pages,
      fullText: pages.join(PAGE_SEPARATOR),
      pagesProcessed: pages.length,
    };
  }

  /**
   * Validates an untrusted decoded value (stored blob, worker reply) and
   * returns it as a TaskResult, or null when the shape does not match.
   */
  static fromUnknown(value: unknown): TaskResult | null {
    if (typeof value !== 'object' || value === null) {
      return null;
    }

    const pages: unknown = Reflect.get(value, 'pages');
    if (
      !Array.isArray(pages) ||
      !pages.every((page): page is string => typeof page === 'string')
    ) {
      return null;
    }

    const rebuilt = ResultAggregator.aggregate(pages);
    const fullText: unknown = Reflect.get(value, 'fullText');
    const pagesProcessed: unknown = Reflect.get(value, 'pagesProcessed');

    if (
      fullText !== rebuilt.fullText ||
      pagesProcessed !== rebuilt.pagesProcessed
    ) {
      return null;
    }

    return rebuilt;
  }
}
