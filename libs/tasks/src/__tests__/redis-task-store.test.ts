import RedisMock from 'ioredis-mock';
import { TaskStatus } from '../enums/task-status.enum';
import {
  CorruptTaskResultError,
  IllegalTaskTransitionError,
  TaskRecordNotFoundError,
} from '../errors/task.errors';
import { ResultAggregator } from '../result-aggregator';
import { RedisTaskStore } from '../stores/redis-task-store';
import { describeTaskStoreContract, newTask } from './task-store-contract';

describeTaskStoreContract('RedisTaskStore', async () => {
  const client = new RedisMock();
  await client.flushall();
  return new RedisTaskStore(client);
});

describe('RedisTaskStore', () => {
  let client: InstanceType<typeof RedisMock>;
  let store: RedisTaskStore;

  afterEach(() => {
    jest.restoreAllMocks();
  });

  beforeEach(async () => {
    client = new RedisMock();
    await client.flushall();
    store = new RedisTaskStore(client);
  });

  it('keeps metadata in a hash and the result in a separate key', async () => {
    const id = await store.create(newTask({ useAccelerator: true }));
    await store.setResult(id, ResultAggregator.aggregate(['a', 'b']));

    const hash = await client.hgetall(`task:${id}`);
    expect(hash).toMatchObject({
      id,
      owner: 'alice',
      status: 'completed',
      use_accelerator: 'true',
      terminal: 'completed',
    });
    expect(hash.error).toBeUndefined();
    expect(JSON.parse(String(await client.get(`task:${id}:result`)))).toEqual({
      pages: ['a', 'b'],
      fullText: 'a\nb',
      pagesProcessed: 2,
    });
  });

  it('indexes tasks per owner and removes the entry on delete', async () => {
    const id = await store.create(newTask());
    expect(await client.zrange('tasks:owner:alice', 0, -1)).toEqual([id]);

    await store.delete(id);
    expect(await client.zrange('tasks:owner:alice', 0, -1)).toEqual([]);
    expect(await client.exists(`task:${id}`, `task:${id}:result`)).toBe(0);
  });

  it('reports a lost claim for the same status as unchanged', async () => {
    const id = await store.create(newTask());
    // Another writer has claimed the task but not yet committed its write
    await client.hset(`task:${id}`, 'terminal', 'failed');

    expect(await store.updateStatus(id, TaskStatus.FAILED, 'boom')).toBe('unchanged');
    expect((await store.get(id))?.status).toBe(TaskStatus.PROCESSING);
  });

  it('rejects a write that lost its claim to the other terminal status', async () => {
    const id = await store.create(newTask());
    await client.hset(`task:${id}`, 'terminal', 'completed');

    await expect(
      store.updateStatus(id, TaskStatus.FAILED, 'boom'),
    ).rejects.toBeInstanceOf(IllegalTaskTransitionError);
  });

  it('leaves no claim behind when a terminal write fails', async () => {
    const id = await store.create(newTask());
    jest.spyOn(client, 'eval').mockRejectedValueOnce(new Error('connection reset'));

    await expect(
      store.setResult(id, ResultAggregator.aggregate(['a'])),
    ).rejects.toThrow('connection reset');
    expect(await client.hget(`task:${id}`, 'terminal')).toBeNull();

    expect(await store.updateStatus(id, TaskStatus.FAILED, 'boom')).toBe('applied');
    const task = await store.get(id);
    expect(task?.status).toBe(TaskStatus.FAILED);
    expect(task?.error).toBe('boom');
    expect(await store.getResult(id)).toBeNull();
  });

  it('does not recreate a task deleted before its terminal write', async () => {
    const id = await store.create(newTask());
    const getTask = store.get.bind(store);
    jest.spyOn(store, 'get').mockImplementationOnce(async (taskId) => {
      const task = await getTask(taskId);
      await client.del(`task:${taskId}`);
      return task;
    });

    await expect(
      store.setResult(id, ResultAggregator.aggregate(['a'])),
    ).rejects.toBeInstanceOf(TaskRecordNotFoundError);
    expect(await client.exists(`task:${id}`, `task:${id}:result`)).toBe(0);
  });

  it('refuses to decode a corrupted result blob', async () => {
    const id = await store.create(newTask());
    await store.setResult(id, ResultAggregator.aggregate(['a']));
    await client.set(`task:${id}:result`, '{"pages": "nope"');

    await expect(store.getResult(id)).rejects.toBeInstanceOf(CorruptTaskResultError);
  });

  it('skips index entries whose hash has disappeared', async () => {
    const kept = await store.create(newTask());
    await client.zadd('tasks:owner:alice', Date.now() + 1000, 'ghost');

    const tasks = await store.list('alice');
    expect(tasks.map((task) => task.id)).toEqual([kept]);
  });
});
