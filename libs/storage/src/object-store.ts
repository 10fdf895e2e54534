import type { Readable } from 'stream';

/**
 * Minimal object-storage primitive behind StorageService.
 *
 * Keys are full object keys (e.g. "uploads/invoice_1700000000_ab12cd34.pdf").
 * Reads of a missing key resolve to null rather than throwing.
 */
export abstract class ObjectStore {
  /** Prepares the backing bucket; called once before first use. */
  abstract connect(): Promise<void>;

  abstract put(key: string, body: Buffer, contentType: string): Promise<void>;

  abstract get(key: string): Promise<Buffer | null>;

  abstract stream(key: string): Promise<Readable | null>;

  /** Keys starting with prefix, in no particular order. */
  abstract list(prefix: string): Promise<string[]>;

  abstract remove(keys: string[]): Promise<void>;
}
