import { TaskStatus } from '../enums/task-status.enum';
import {
  IllegalTaskTransitionError,
  TaskRecordNotFoundError,
} from '../errors/task.errors';
import type { NewTask } from '../interfaces/task.interface';
import { ResultAggregator } from '../result-aggregator';
import type { TaskStore } from '../task-store';

/** Only Date is faked so promise-based clients keep running normally. */
const FAKE_DATE_ONLY: Parameters<typeof jest.useFakeTimers>[0] = {
  doNotFake: [
    'hrtime',
    'nextTick',
    'performance',
    'queueMicrotask',
    'requestAnimationFrame',
    'cancelAnimationFrame',
    'requestIdleCallback',
    'cancelIdleCallback',
    'setImmediate',
    'clearImmediate',
    'setInterval',
    'clearInterval',
    'setTimeout',
    'clearTimeout',
  ],
};

export function newTask(overrides: Partial<NewTask> = {}): NewTask {
  return {
    owner: 'alice',
    filename: 'invoice_1700000000_abcd1234.pdf',
    originalFilename: 'invoice.pdf',
    language: 'en',
    useAccelerator: false,
    ...overrides,
  };
}

/**
 * Behaviour every TaskStore implementation must share. Registered from the
 * per-implementation test files.
 */
export function describeTaskStoreContract(
  name: string,
  createStore: () => Promise<TaskStore>,
): void {
  describe(`${name} (TaskStore contract)`, () => {
    let store: TaskStore;

    beforeEach(async () => {
      store = await createStore();
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    it('creates tasks in processing with no result', async () => {
      const id = await store.create(newTask());

      expect(id).toMatch(/^[0-9a-f]{32}$/);
      const task = await store.get(id);
      expect(task).toMatchObject({
        id,
        owner: 'alice',
        status: TaskStatus.PROCESSING,
        filename: 'invoice_1700000000_abcd1234.pdf',
        originalFilename: 'invoice.pdf',
        language: 'en',
        useAccelerator: false,
        error: null,
        externalJobId: null,
        finishedAt: null,
      });
      expect(await store.getResult(id)).toBeNull();
    });

    it('generates unique ids', async () => {
      const a = await store.create(newTask());
      const b = await store.create(newTask());
      expect(a).not.toBe(b);
    });

    it('returns null for unknown ids', async () => {
      expect(await store.get('missing')).toBeNull();
    });

    it('stores result and completed status together', async () => {
      const id = await store.create(newTask());
      const result = ResultAggregator.aggregate(['one', 'two']);

      expect(await store.setResult(id, result)).toBe('applied');

      const task = await store.get(id);
      expect(task?.status).toBe(TaskStatus.COMPLETED);
      expect(task?.error).toBeNull();
      expect(task?.finishedAt).not.toBeNull();
      expect(await store.getResult(id)).toEqual(result);
    });

    it('stores failed status with its error and no result', async () => {
      const id = await store.create(newTask());

      expect(await store.updateStatus(id, TaskStatus.FAILED, 'render error')).toBe(
        'applied',
      );

      const task = await store.get(id);
      expect(task?.status).toBe(TaskStatus.FAILED);
      expect(task?.error).toBe('render error');
      expect(await store.getResult(id)).toBeNull();
    });

    it('treats a repeated identical terminal write as a no-op', async () => {
      const id = await store.create(newTask());
      const result = ResultAggregator.aggregate(['one']);

      await store.setResult(id, result);
      expect(await store.setResult(id, ResultAggregator.aggregate(['one']))).toBe(
        'unchanged',
      );
      expect(await store.getResult(id)).toEqual(result);
    });

    it('never flips a completed task to failed', async () => {
      const id = await store.create(newTask());
      await store.setResult(id, ResultAggregator.aggregate(['one']));

      await expect(
        store.updateStatus(id, TaskStatus.FAILED, 'late failure'),
      ).rejects.toBeInstanceOf(IllegalTaskTransitionError);
      expect((await store.get(id))?.status).toBe(TaskStatus.COMPLETED);
    });

    it('never flips a failed task to completed', async () => {
      const id = await store.create(newTask());
      await store.updateStatus(id, TaskStatus.FAILED, 'boom');

      await expect(
        store.setResult(id, ResultAggregator.aggregate(['one'])),
      ).rejects.toBeInstanceOf(IllegalTaskTransitionError);
      expect(await store.getResult(id)).toBeNull();
    });

    it('rejects transitions on unknown tasks', async () => {
      await expect(
        store.updateStatus('missing', TaskStatus.FAILED, 'boom'),
      ).rejects.toBeInstanceOf(TaskRecordNotFoundError);
    });

    it('records the external job id', async () => {
      const id = await store.create(newTask());
      await store.setExternalJobId(id, 'job-7');
      expect((await store.get(id))?.externalJobId).toBe('job-7');
    });

    it('deletes metadata and result together', async () => {
      const id = await store.create(newTask());
      await store.setResult(id, ResultAggregator.aggregate(['one']));

      expect(await store.delete(id)).toBe(true);
      expect(await store.get(id)).toBeNull();
      expect(await store.getResult(id)).toBeNull();
      expect(await store.list('alice')).toEqual([]);
      expect(await store.delete(id)).toBe(false);
    });

    it('lists only the owner tasks, newest first, with an optional status filter', async () => {
      jest.useFakeTimers(FAKE_DATE_ONLY);

      jest.setSystemTime(new Date('2026-03-01T10:00:00.000Z'));
      const first = await store.create(newTask());
      jest.setSystemTime(new Date('2026-03-01T10:00:05.000Z'));
      const other = await store.create(newTask({ owner: 'bob' }));
      jest.setSystemTime(new Date('2026-03-01T10:00:10.000Z'));
      const second = await store.create(newTask());
      await store.updateStatus(second, TaskStatus.FAILED, 'boom');

      const all = await store.list('alice');
      expect(all.map((task) => task.id)).toEqual([second, first]);
      expect(all.map((task) => task.createdAt)).toEqual([
        '2026-03-01T10:00:10.000Z',
        '2026-03-01T10:00:00.000Z',
      ]);

      const failed = await store.list('alice', TaskStatus.FAILED);
      expect(failed.map((task) => task.id)).toEqual([second]);

      const bobs = await store.list('bob');
      expect(bobs.map((task) => task.id)).toEqual([other]);
    });
  });
}
