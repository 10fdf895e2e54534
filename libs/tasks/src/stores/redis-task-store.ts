import { Inject, Injectable, Logger } from '@nestjs/common';
import Redis from 'ioredis';
import { REDIS_CLIENT, assertCommitted, type ExecResult } from '@invoice-ocr/redis';
import { TaskStatus, isTaskStatus } from '../enums/task-status.enum';
import {
  CorruptTaskResultError,
  IllegalTaskTransitionError,
  TaskRecordNotFoundError,
} from '../errors/task.errors';
import type { NewTask, Task, TaskResult } from '../interfaces/task.interface';
import { ResultAggregator } from '../result-aggregator';
import { generateTaskId } from '../task-id';
import { TaskStateMachine, type TerminalWrite } from '../task-state-machine';
import { TaskStore, type TransitionOutcome } from '../task-store';

/**
 * Redis key factories. Layout:
 *   task:{id}            hash   - task metadata
 *   task:{id}:result     string - JSON-encoded TaskResult (COMPLETED only)
 *   tasks:owner:{owner}  zset   - task ids scored by creation time (ms)
 */
function taskKey(id: string): string {
  return `task:${id}`;
}

function resultKey(id: string): string {
  return `task:${id}:result`;
}

function ownerIndexKey(owner: string): string {
  return `tasks:owner:${owner}`;
}

/** Hash field claimed with HSETNX by the first terminal writer. */
const TERMINAL_CLAIM_FIELD = 'terminal';

/** Reply of TERMINAL_WRITE_SCRIPT when the claim was won and the write applied. */
const TERMINAL_WRITE_APPLIED = 'applied';
/** Reply of TERMINAL_WRITE_SCRIPT when the task hash no longer exists. */
const TERMINAL_WRITE_MISSING = 'missing';

/**
 * KEYS: task hash, result key.
 * ARGV: target status, result JSON or error message, finished_at.
 * Replies "applied", "missing", or the status that already holds the claim.
 */
const TERMINAL_WRITE_SCRIPT = `
if redis.call('EXISTS', KEYS[1]) == 0 then
  return '${TERMINAL_WRITE_MISSING}'
end
if redis.call('HSETNX', KEYS[1], '${TERMINAL_CLAIM_FIELD}', ARGV[1]) == 0 then
  return redis.call('HGET', KEYS[1], '${TERMINAL_CLAIM_FIELD}')
end
if ARGV[1] == '${TaskStatus.COMPLETED}' then
  redis.call('SET', KEYS[2], ARGV[2])
  redis.call('HDEL', KEYS[1], 'error')
else
  redis.call('DEL', KEYS[2])
  redis.call('HSET', KEYS[1], 'error', ARGV[2])
end
redis.call('HSET', KEYS[1], 'status', ARGV[1])
redis.call('HSET', KEYS[1], 'finished_at', ARGV[3])
return '${TERMINAL_WRITE_APPLIED}'
`;

/**
 * RedisTaskStore - durable TaskStore on Redis hashes.
 *
 * Terminal transitions:
 *   1. Read the task and let TaskStateMachine decide (apply / noop / throw)
 *   2. Run TERMINAL_WRITE_SCRIPT: claim the task with
 *      HSETNX task:{id} terminal <status> and, only when the claim is won,
 *      write status, error/result and finished_at. Claim and write commit
 *      together, so a failed write never leaves a claim behind and readers
 *      never see COMPLETED without a result or FAILED with a stale one
 *
 * A writer that loses the claim to the same status is treated as a late
 * duplicate of the same run and reports `unchanged`; losing it to the other
 * terminal status is an illegal transition.
 */
@Injectable()
export class RedisTaskStore extends TaskStore {
  private readonly logger = new Logger(RedisTaskStore.name);

  constructor(
    @Inject(REDIS_CLIENT)
    private readonly client: Redis,
  ) {
    super();
  }

  async create(meta: NewTask): Promise<string> {
    const id = generateTaskId();
    const createdAt = new Date();

    const results: ExecResult = await this.client
      .multi()
      .hset(taskKey(id), {
        id,
        owner: meta.owner,
        status: TaskStateMachine.INITIAL_STATUS,
        filename: meta.filename,
        original_filename: meta.originalFilename,
        language: meta.language,
        use_accelerator: String(meta.useAccelerator),
        created_at: createdAt.toISOString(),
      })
      .zadd(ownerIndexKey(meta.owner), createdAt.getTime(), id)
      .exec();
    assertCommitted(results, `create task ${id}`);

    this.logger.debug(`Created task ${id} for owner ${meta.owner}`);
    return id;
  }

  async get(id: string): Promise<Task | null> {
    const hash = await this.client.hgetall(taskKey(id));
    return toTask(hash);
  }

  async updateStatus(
    id: string,
    status: TaskStatus,
    error?: string,
  ): Promise<TransitionOutcome> {
    return this.transition(id, TaskStateMachine.statusWrite(id, status, error));
  }

  async setResult(id: string, result: TaskResult): Promise<TransitionOutcome> {
    return this.transition(id, { status: TaskStatus.COMPLETED, result });
  }

  async getResult(id: string): Promise<TaskResult | null> {
    const raw = await this.client.get(resultKey(id));
    if (raw === null) {
      return null;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw);
    } catch {
      throw new CorruptTaskResultError(id);
    }

    const result = ResultAggregator.fromUnknown(decoded);
    if (!result) {
      throw new CorruptTaskResultError(id);
    }
    return result;
  }

  async setExternalJobId(id: string, jobId: string): Promise<void> {
    const exists = await this.client.hexists(taskKey(id), 'id');
    if (!exists) {
      throw new TaskRecordNotFoundError(id);
    }
    await this.client.hset(taskKey(id), 'external_job_id', jobId);
  }

  async delete(id: string): Promise<boolean> {
    const owner = await this.client.hget(taskKey(id), 'owner');
    if (owner === null) {
      return false;
    }

    const results: ExecResult = await this.client
      .multi()
      .del(taskKey(id), resultKey(id))
      .zrem(ownerIndexKey(owner), id)
      .exec();
    assertCommitted(results, `delete task ${id}`);

    return true;
  }

  async list(owner: string, status?: TaskStatus): Promise<Task[]> {
    const ids = await this.client.zrevrange(ownerIndexKey(owner), 0, -1);
    if (ids.length === 0) {
      return [];
    }

    const pipeline = this.client.pipeline();
    for (const id of ids) {
      pipeline.hgetall(taskKey(id));
    }
    const replies: ExecResult = await pipeline.exec();

    const tasks: Task[] = [];
    for (const [error, reply] of replies ?? []) {
      if (error) {
        throw error;
      }
      const task = isStringRecord(reply) ? toTask(reply) : null;
      // Ids whose hash is gone (deleted mid-listing) are skipped
      if (task && task.owner === owner && (!status || task.status === status)) {
        tasks.push(task);
      }
    }
    return tasks;
  }

  // ── Terminal transitions ─────────────────────────────────

  private async transition(
    id: string,
    write: TerminalWrite,
  ): Promise<TransitionOutcome> {
    const task = await this.get(id);
    if (!task) {
      throw new TaskRecordNotFoundError(id);
    }

    const decision = TaskStateMachine.evaluate(
      id,
      {
        status: task.status,
        error: task.error,
        result: task.status === TaskStatus.COMPLETED ? await this.getResult(id) : null,
      },
      write,
    );
    if (decision === 'noop') {
      return 'unchanged';
    }

    const reply = await this.client.eval(
      TERMINAL_WRITE_SCRIPT,
      2,
      taskKey(id),
      resultKey(id),
      write.status,
      write.status === TaskStatus.COMPLETED ? JSON.stringify(write.result) : write.error,
      new Date().toISOString(),
    );

    if (reply === TERMINAL_WRITE_MISSING) {
      throw new TaskRecordNotFoundError(id);
    }
    if (reply !== TERMINAL_WRITE_APPLIED) {
      return this.resolveLostClaim(id, write, typeof reply === 'string' ? reply : null);
    }

    this.logger.debug(`Task ${id} → ${write.status}`);
    return 'applied';
  }

  private resolveLostClaim(
    id: string,
    write: TerminalWrite,
    winner: string | null,
  ): TransitionOutcome {
    if (winner === write.status) {
      this.logger.warn(
        `Task ${id}: concurrent ${write.status} write already claimed, skipping`,
      );
      return 'unchanged';
    }

    throw new IllegalTaskTransitionError(
      id,
      `already claimed by a ${winner ?? 'deleted'} write`,
    );
  }
}

// ── Decoding helpers ─────────────────────────────────────

function toTask(hash: Record<string, string>): Task | null {
  const status = hash.status;
  if (!hash.id || !isTaskStatus(status)) {
    return null;
  }

  return {
    id: hash.id,
    owner: hash.owner ?? '',
    status,
    filename: hash.filename ?? '',
    originalFilename: hash.original_filename ?? '',
    language: hash.language ?? 'en',
    useAccelerator: hash.use_accelerator === 'true',
    createdAt: hash.created_at ?? '',
    finishedAt: hash.finished_at ?? null,
    error: hash.error ?? null,
    externalJobId: hash.external_job_id ?? null,
  };
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.values(value).every((field) => typeof field === 'string')
  );
}
