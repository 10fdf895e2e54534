import { Injectable, Logger } from '@nestjs/common';
import type { Readable } from 'stream';
import { ObjectStore } from './object-store';
import { StorageObjectNotFoundError } from './storage.errors';
import {
  OUTPUTS_PREFIX,
  UPLOADS_PREFIX,
  artifactBase,
  buildStoredFilename,
  isDerivedArtifact,
} from './stored-filename';

/**
 * StorageService - the file layout shared by the gateway and the worker.
 *
 * Object key pattern:
 *   uploads/{stored filename}          original upload
 *   outputs/{base}.txt | .json         recognized text
 *   outputs/{base}.png                 converted single image
 *   outputs/{base}_page_{n}.png        rendered PDF page
 *
 * where {stored filename} = {sanitized base}_{unix seconds}_{8 hex}{ext}.
 */
@Injectable()
export class StorageService {
  private readonly logger = new Logger(StorageService.name);

  constructor(private readonly store: ObjectStore) {}

  /**
   * Stores an upload under a fresh stored filename and returns that name.
   *
   * @throws StorageOperationError on any object-store failure
   */
  async uploadFile(buffer: Buffer, originalName: string, mimeType: string): Promise<string> {
    const storedFilename = buildStoredFilename(originalName);

    this.logger.debug(`Uploading ${storedFilename} (${buffer.length} bytes)`);
    await this.store.put(UPLOADS_PREFIX + storedFilename, buffer, mimeType);
    this.logger.log(`Uploaded "${storedFilename}" (${buffer.length} bytes)`);

    return storedFilename;
  }

  async downloadUpload(storedFilename: string): Promise<Buffer> {
    const key = UPLOADS_PREFIX + storedFilename;
    const body = await this.store.get(key);
    if (!body) {
      throw new StorageObjectNotFoundError(key);
    }
    return body;
  }

  async putArtifact(name: string, body: Buffer, contentType: string): Promise<void> {
    await this.store.put(OUTPUTS_PREFIX + name, body, contentType);
  }

  /** Opens a derived artifact for streaming; null when it does not exist. */
  openArtifact(name: string): Promise<Readable | null> {
    return this.store.stream(OUTPUTS_PREFIX + name);
  }

  /**
   * Removes the upload and every derived artifact of it. Returns the number
   * of objects deleted.
   */
  async deleteTaskFiles(storedFilename: string): Promise<number> {
    const base = artifactBase(storedFilename);
    const outputs = await this.store.list(OUTPUTS_PREFIX + base);
    const uploads = await this.store.list(UPLOADS_PREFIX + storedFilename);

    const keys = [
      ...uploads.filter((key) => key === UPLOADS_PREFIX + storedFilename),
      ...outputs.filter((key) =>
        isDerivedArtifact(storedFilename, key.slice(OUTPUTS_PREFIX.length)),
      ),
    ];

    await this.store.remove(keys);
    this.logger.log(`Deleted ${keys.length} object(s) for "${storedFilename}"`);
    return keys.length;
  }
}
