import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as Minio from 'minio';
import type { Readable } from 'stream';
import { ObjectStore } from '../object-store';
import { StorageOperationError } from '../storage.errors';

/** MinIO error codes that mean "the key is not there" */
const MISSING_OBJECT_CODES = new Set(['NoSuchKey', 'NotFound']);

function isMissingObjectError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' && MISSING_OBJECT_CODES.has(code);
}

/**
 * MinIO (S3-compatible) object store.
 *
 * Every failure other than a missing key surfaces as StorageOperationError so
 * callers never depend on MinIO's error classes.
 */
export class MinioObjectStore extends ObjectStore {
  private readonly logger = new Logger(MinioObjectStore.name);
  private readonly client: Minio.Client;
  private readonly bucket: string;
  private readonly endpoint: string;
  private readonly port: number;

  constructor(configService: ConfigService) {
    super();
    this.endpoint = configService.get<string>('MINIO_ENDPOINT', 'localhost');
    this.port = Number(configService.get<string>('MINIO_PORT', '9000'));
    this.bucket = configService.get<string>('MINIO_BUCKET', 'invoice-ocr');

    this.client = new Minio.Client({
      endPoint: this.endpoint,
      port: this.port,
      useSSL: configService.get<string>('MINIO_USE_SSL', 'false') === 'true',
      accessKey: configService.get<string>('MINIO_ACCESS_KEY', 'minioadmin'),
      secretKey: configService.get<string>('MINIO_SECRET_KEY', 'minioadmin'),
    });
  }

  /**
   * Creates the bucket if it does not already exist. A failure is logged,
   * not thrown: later operations then fail with StorageOperationError.
   */
  async connect(): Promise<void> {
    try {
      const exists = await this.client.bucketExists(this.bucket);
      if (!exists) {
        await this.client.makeBucket(this.bucket, 'us-east-1');
        this.logger.log(`Created bucket "${this.bucket}"`);
      }
      this.logger.log(`Object store ready, bucket: "${this.bucket}" @ ${this.endpoint}:${this.port}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to ensure bucket "${this.bucket}" exists: ${message}`);
    }
  }

  async put(key: string, body: Buffer, contentType: string): Promise<void> {
    try {
      await this.client.putObject(this.bucket, key, body, body.length, {
        'Content-Type': contentType,
      });
    } catch (error) {
      throw new StorageOperationError('put', key, error);
    }
  }

  async get(key: string): Promise<Buffer | null> {
    const stream = await this.stream(key);
    if (!stream) return null;

    const chunks: Buffer[] = [];
    try {
      for await (const chunk of stream) {
        chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
      }
    } catch (error) {
      throw new StorageOperationError('get', key, error);
    }
    return Buffer.concat(chunks);
  }

  async stream(key: string): Promise<Readable | null> {
    try {
      return await this.client.getObject(this.bucket, key);
    } catch (error) {
      if (isMissingObjectError(error)) return null;
      throw new StorageOperationError('get', key, error);
    }
  }

  list(prefix: string): Promise<string[]> {
    return new Promise((resolve, reject) => {
      const keys: string[] = [];
      const stream = this.client.listObjectsV2(this.bucket, prefix, true);

      stream.on('data', (item: { name?: string }) => {
        if (item.name) keys.push(item.name);
      });
      stream.on('error', (error: Error) =>
        reject(new StorageOperationError('list', prefix, error)),
      );
      stream.on('end', () => resolve(keys));
    });
  }

  async remove(keys: string[]): Promise<void> {
    if (keys.length === 0) return;

    try {
      await this.client.removeObjects(this.bucket, keys);
    } catch (error) {
      throw new StorageOperationError('remove', keys.join(', '), error);
    }
  }
}
