import { Readable } from 'stream';
import { ObjectStore } from '../object-store';

interface StoredObject {
  body: Buffer;
  contentType: string;
}

/** Process-local object store for development and tests. */
export class InMemoryObjectStore extends ObjectStore {
  private readonly objects = new Map<string, StoredObject>();

  async connect(): Promise<void> {
    // nothing to prepare
  }

  async put(key: string, body: Buffer, contentType: string): Promise<void> {
    this.objects.set(key, { body: Buffer.from(body), contentType });
  }

  async get(key: string): Promise<Buffer | null> {
    const stored = this.objects.get(key);
    return stored ? Buffer.from(stored.body) : null;
  }

  async stream(key: string): Promise<Readable | null> {
    const body = await this.get(key);
    return body ? Readable.from([body]) : null;
  }

  async list(prefix: string): Promise<string[]> {
    return [...this.objects.keys()].filter((key) => key.startsWith(prefix));
  }

  async remove(keys: string[]): Promise<void> {
    for (const key of keys) {
      this.objects.delete(key);
    }
  }

  contentTypeOf(key: string): string | null {
    return this.objects.get(key)?.contentType ?? null;
  }
}
