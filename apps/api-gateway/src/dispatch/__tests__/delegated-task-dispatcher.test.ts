import { InMemoryTaskStore, TaskStatus, type Task } from '@invoice-ocr/tasks';
import { DelegatedTaskDispatcher } from '../delegated-task-dispatcher';
import { JobQueueClient, type JobPollResult, type JobSpec } from '../job-queue-client';

class FakeJobQueue extends JobQueueClient {
  readonly submitted: JobSpec[] = [];
  readonly polled: string[] = [];
  outcome: JobPollResult = { state: 'pending' };
  pollError: Error | null = null;

  async submit(spec: JobSpec): Promise<string> {
    this.submitted.push(spec);
    return `job-${this.submitted.length}`;
  }

  async poll(jobId: string): Promise<JobPollResult> {
    this.polled.push(jobId);
    if (this.pollError) throw this.pollError;
    return this.outcome;
  }
}

describe('DelegatedTaskDispatcher', () => {
  let tasks: InMemoryTaskStore;
  let queue: FakeJobQueue;
  let dispatcher: DelegatedTaskDispatcher;
  let task: Task;

  beforeEach(async () => {
    tasks = new InMemoryTaskStore();
    queue = new FakeJobQueue();
    dispatcher = new DelegatedTaskDispatcher(tasks, queue);

    const id = await tasks.create({
      owner: 'alice',
      filename: 'inv_1700000000_abcd1234.pdf',
      originalFilename: 'inv.pdf',
      language: 'german',
      useAccelerator: true,
    });
    await dispatcher.submit(await current(id));
    task = await current(id);
  });

  async function current(id: string): Promise<Task> {
    const found = await tasks.get(id);
    if (!found) throw new Error(`task ${id} missing`);
    return found;
  }

  it('submits the job and records its id', () => {
    expect(queue.submitted).toEqual([
      {
        taskId: task.id,
        storedFilename: 'inv_1700000000_abcd1234.pdf',
        language: 'german',
        useAccelerator: true,
      },
    ]);
    expect(task.externalJobId).toBe('job-1');
  });

  it('keeps a pending job processing', async () => {
    const reconciled = await dispatcher.reconcile(task);

    expect(reconciled.status).toBe(TaskStatus.PROCESSING);
    expect(queue.polled).toEqual(['job-1']);
  });

  it('folds a successful job into the task', async () => {
    queue.outcome = { state: 'success', pages: ['one', 'two'] };

    const reconciled = await dispatcher.reconcile(task);

    expect(reconciled.status).toBe(TaskStatus.COMPLETED);
    expect(await tasks.getResult(task.id)).toEqual({
      pages: ['one', 'two'],
      fullText: 'one\ntwo',
      pagesProcessed: 2,
    });
  });

  it('makes a job failure visible on the next read and not before', async () => {
    queue.outcome = { state: 'failure', error: 'worker ran out of memory' };

    // The worker has failed, but nobody has read the task yet
    expect((await current(task.id)).status).toBe(TaskStatus.PROCESSING);

    const reconciled = await dispatcher.reconcile(task);

    expect(reconciled.status).toBe(TaskStatus.FAILED);
    expect(reconciled.error).toBe('worker ran out of memory');
  });

  it('falls back to a generic message when the job gives none', async () => {
    queue.outcome = { state: 'failure', error: '' };

    expect((await dispatcher.reconcile(task)).error).toBe('Delegated job failed');
  });

  it('leaves the task as it is when the queue cannot be reached', async () => {
    queue.pollError = new Error('UNAVAILABLE');

    const reconciled = await dispatcher.reconcile(task);

    expect(reconciled).toBe(task);
    expect((await current(task.id)).status).toBe(TaskStatus.PROCESSING);
  });

  it('does not poll once the task is terminal', async () => {
    queue.outcome = { state: 'success', pages: ['one'] };
    const completed = await dispatcher.reconcile(task);
    queue.polled.length = 0;

    expect(await dispatcher.reconcile(completed)).toBe(completed);
    expect(queue.polled).toEqual([]);
  });
});
