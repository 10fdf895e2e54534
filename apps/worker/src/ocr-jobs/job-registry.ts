import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis from 'ioredis';
import { randomUUID } from 'crypto';
import { REDIS_CLIENT, assertCommitted, type ExecResult } from '@invoice-ocr/redis';
import { isJobState, type JobState } from '@invoice-ocr/proto';
import type { JobRecord } from './interfaces/job-record.interface';

/** Job records expire a day after their last write unless configured */
export const DEFAULT_JOB_TTL_SECONDS = 24 * 60 * 60;

/** Redis key layout: ocr-job:{id} hash */
function jobKey(jobId: string): string {
  return `ocr-job:${jobId}`;
}

function parsePageTexts(raw: string | undefined): string[] {
  if (!raw) return [];
  const parsed: unknown = JSON.parse(raw);
  if (Array.isArray(parsed) && parsed.every((page): page is string => typeof page === 'string')) {
    return parsed;
  }
  throw new Error('page_texts is not a list of strings');
}

/**
 * JobRegistry - the worker's record of every job it has accepted.
 *
 * The gateway only ever sees these records through GetJob. Each write
 * refreshes the TTL, so a finished job stays readable for
 * WORKER_JOB_TTL_SECONDS after it ended.
 */
@Injectable()
export class JobRegistry {
  private readonly logger = new Logger(JobRegistry.name);
  private readonly ttlSeconds: number;

  constructor(
    @Inject(REDIS_CLIENT)
    private readonly client: Redis,
    configService: ConfigService,
  ) {
    const ttl = Number(configService.get<string>('WORKER_JOB_TTL_SECONDS', String(DEFAULT_JOB_TTL_SECONDS)));
    this.ttlSeconds = Number.isFinite(ttl) && ttl > 0 ? Math.floor(ttl) : DEFAULT_JOB_TTL_SECONDS;
  }

  async create(taskId: string): Promise<JobRecord> {
    const now = new Date().toISOString();
    const record: JobRecord = {
      jobId: randomUUID(),
      taskId,
      state: 'PENDING',
      pageTexts: [],
      errorMessage: '',
      createdAt: now,
      updatedAt: now,
    };

    const results: ExecResult = await this.client
      .multi()
      .hset(jobKey(record.jobId), {
        job_id: record.jobId,
        task_id: record.taskId,
        state: record.state,
        page_texts: '[]',
        error_message: '',
        created_at: now,
        updated_at: now,
      })
      .expire(jobKey(record.jobId), this.ttlSeconds)
      .exec();
    assertCommitted(results, `create job for task ${taskId}`);

    return record;
  }

  async get(jobId: string): Promise<JobRecord | null> {
    const hash = await this.client.hgetall(jobKey(jobId));
    if (!hash.job_id) {
      return null;
    }

    const state = hash.state;
    if (!isJobState(state)) {
      this.logger.warn(`Job ${jobId} has unknown state "${state}"`);
      return null;
    }

    return {
      jobId: hash.job_id,
      taskId: hash.task_id ?? '',
      state,
      pageTexts: parsePageTexts(hash.page_texts),
      errorMessage: hash.error_message ?? '',
      createdAt: hash.created_at ?? '',
      updatedAt: hash.updated_at ?? '',
    };
  }

  async complete(jobId: string, pageTexts: string[]): Promise<void> {
    await this.finish(jobId, 'SUCCESS', { page_texts: JSON.stringify(pageTexts), error_message: '' });
  }

  async fail(jobId: string, errorMessage: string): Promise<void> {
    await this.finish(jobId, 'FAILURE', { page_texts: '[]', error_message: errorMessage });
  }

  // ── Private methods ──────────────────────────────────────

  private async finish(
    jobId: string,
    state: Exclude<JobState, 'PENDING'>,
    fields: { page_texts: string; error_message: string },
  ): Promise<void> {
    // A record that already expired is not resurrected
    if ((await this.client.exists(jobKey(jobId))) === 0) {
      this.logger.warn(`Job ${jobId} expired before it finished as ${state}`);
      return;
    }

    const results: ExecResult = await this.client
      .multi()
      .hset(jobKey(jobId), { ...fields, state, updated_at: new Date().toISOString() })
      .expire(jobKey(jobId), this.ttlSeconds)
      .exec();
    assertCommitted(results, `finish job ${jobId} as ${state}`);
  }
}
