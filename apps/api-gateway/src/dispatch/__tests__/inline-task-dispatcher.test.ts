import { ConfigService } from '@nestjs/config';
import {
  ConversionService,
  PageRecognizer,
  PdfRasterizer,
  PipelineRunner,
} from '@invoice-ocr/pipeline';
import { InMemoryObjectStore, StorageService } from '@invoice-ocr/storage';
import { InMemoryTaskStore, TaskStatus } from '@invoice-ocr/tasks';
import { InlineTaskDispatcher } from '../inline-task-dispatcher';

class TwoPageRasterizer extends PdfRasterizer {
  async render(): Promise<Buffer[]> {
    return [Buffer.from('p1'), Buffer.from('p2')];
  }
}

/** Holds every recognize() call until release() */
class GatedRecognizer extends PageRecognizer {
  private readonly gate: Promise<void>;
  private readonly release: () => void;
  failWith: Error | null = null;

  constructor() {
    super();
    let release: () => void = () => undefined;
    this.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.release = release;
  }

  open(): void {
    this.release();
  }

  async recognize(images: Buffer[]): Promise<string[]> {
    await this.gate;
    if (this.failWith) throw this.failWith;
    return images.map((image) => `read ${image.toString()}`);
  }
}

describe('InlineTaskDispatcher', () => {
  let tasks: InMemoryTaskStore;
  let objects: InMemoryObjectStore;
  let recognizer: GatedRecognizer;
  let storage: StorageService;
  let dispatcher: InlineTaskDispatcher;

  async function createTask(filename: string): Promise<string> {
    await objects.put(`uploads/${filename}`, Buffer.from('bytes'), 'application/octet-stream');
    return tasks.create({
      owner: 'alice',
      filename,
      originalFilename: filename,
      language: 'en',
      useAccelerator: false,
    });
  }

  beforeEach(() => {
    tasks = new InMemoryTaskStore();
    objects = new InMemoryObjectStore();
    recognizer = new GatedRecognizer();
    storage = new StorageService(objects);
    const runner = new PipelineRunner(
      storage,
      new ConversionService(new TwoPageRasterizer(), new ConfigService({})),
      recognizer,
    );
    dispatcher = new InlineTaskDispatcher(tasks, runner, storage);
  });

  it('returns before the pipeline finishes and completes the task later', async () => {
    const id = await createTask('inv_1700000000_abcd1234.pdf');
    const task = await tasks.get(id);
    if (!task) throw new Error('task missing');

    await dispatcher.submit(task);

    expect(dispatcher.pending).toBe(1);
    expect((await tasks.get(id))?.status).toBe(TaskStatus.PROCESSING);
    expect(await tasks.getResult(id)).toBeNull();

    recognizer.open();
    await dispatcher.drain();

    expect(dispatcher.pending).toBe(0);
    expect((await tasks.get(id))?.status).toBe(TaskStatus.COMPLETED);
    expect(await tasks.getResult(id)).toEqual({
      pages: ['read p1', 'read p2'],
      fullText: 'read p1\nread p2',
      pagesProcessed: 2,
    });
  });

  it('records a stage failure on the task', async () => {
    const id = await createTask('scan_1700000000_abcd1234.png');
    const task = await tasks.get(id);
    if (!task) throw new Error('task missing');
    recognizer.failWith = new Error('engine crashed');

    await dispatcher.submit(task);
    recognizer.open();
    await dispatcher.drain();

    const failed = await tasks.get(id);
    expect(failed?.status).toBe(TaskStatus.FAILED);
    expect(failed?.error).toBe('engine crashed');
    expect(await tasks.getResult(id)).toBeNull();
  });

  it('fails a task whose upload is gone', async () => {
    const id = await tasks.create({
      owner: 'alice',
      filename: 'gone_1700000000_abcd1234.png',
      originalFilename: 'gone.png',
      language: 'en',
      useAccelerator: false,
    });
    const task = await tasks.get(id);
    if (!task) throw new Error('task missing');

    await dispatcher.submit(task);
    await dispatcher.drain();

    expect(await tasks.get(id)).toMatchObject({
      status: TaskStatus.FAILED,
      error: 'Object "uploads/gone_1700000000_abcd1234.png" does not exist',
    });
  });

  it('sweeps artifacts written after the task was deleted mid-run', async () => {
    const id = await createTask('inv_1700000000_abcd1234.pdf');
    const task = await tasks.get(id);
    if (!task) throw new Error('task missing');

    await dispatcher.submit(task);
    await storage.deleteTaskFiles(task.filename);
    await tasks.delete(id);

    recognizer.open();
    await dispatcher.drain();

    expect(await tasks.get(id)).toBeNull();
    expect(await objects.list('')).toEqual([]);
  });

  it('leaves the task untouched on reconcile', async () => {
    const id = await createTask('a_1700000000_abcd1234.png');
    const task = await tasks.get(id);
    if (!task) throw new Error('task missing');

    expect(await dispatcher.reconcile(task)).toBe(task);
  });
});
