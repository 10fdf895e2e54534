import { ConfigService } from '@nestjs/config';
import RedisMock from 'ioredis-mock';
import {
  ConversionService,
  PageRecognizer,
  PdfRasterizer,
  PipelineRunner,
} from '@invoice-ocr/pipeline';
import { GrpcInvalidArgumentException, GrpcNotFoundException } from '@invoice-ocr/proto';
import { InMemoryObjectStore, StorageService } from '@invoice-ocr/storage';
import { JobRegistry } from '../job-registry';
import { OcrJobsService } from '../ocr-jobs.service';

class TwoPageRasterizer extends PdfRasterizer {
  async render(): Promise<Buffer[]> {
    return [Buffer.from('p1'), Buffer.from('p2')];
  }
}

class EchoRecognizer extends PageRecognizer {
  async recognize(images: Buffer[]): Promise<string[]> {
    return images.map((image) => `read ${image.toString()}`);
  }
}

describe('OcrJobsService', () => {
  let objects: InMemoryObjectStore;
  let service: OcrJobsService;

  beforeEach(async () => {
    const client = new RedisMock();
    await client.flushall();

    objects = new InMemoryObjectStore();
    const runner = new PipelineRunner(
      new StorageService(objects),
      new ConversionService(new TwoPageRasterizer(), new ConfigService({})),
      new EchoRecognizer(),
    );
    service = new OcrJobsService(new JobRegistry(client, new ConfigService({})), runner);
  });

  const request = {
    taskId: 'task-1',
    storedFilename: 'inv_1700000000_abcd1234.pdf',
    language: 'en',
    useAccelerator: false,
  };

  it('accepts a job as pending and finishes it in the background', async () => {
    await objects.put('uploads/inv_1700000000_abcd1234.pdf', Buffer.from('%PDF'), 'application/pdf');

    const accepted = await service.submitJob(request);
    expect(accepted).toEqual({ jobId: expect.any(String), state: 'PENDING' });

    await service.drain();

    expect(await service.getJob({ jobId: accepted.jobId })).toEqual({
      jobId: accepted.jobId,
      state: 'SUCCESS',
      pageTexts: ['read p1', 'read p2'],
      errorMessage: '',
    });
  });

  it('records a pipeline failure on the job', async () => {
    const accepted = await service.submitJob(request);
    await service.drain();

    expect(await service.getJob({ jobId: accepted.jobId })).toEqual({
      jobId: accepted.jobId,
      state: 'FAILURE',
      pageTexts: [],
      errorMessage: 'Object "uploads/inv_1700000000_abcd1234.pdf" does not exist',
    });
  });

  it('answers NOT_FOUND for unknown jobs', async () => {
    await expect(service.getJob({ jobId: 'missing' })).rejects.toBeInstanceOf(GrpcNotFoundException);
  });

  it('rejects incomplete requests and unknown languages', async () => {
    await expect(service.submitJob({ ...request, storedFilename: '' })).rejects.toBeInstanceOf(
      GrpcInvalidArgumentException,
    );
    await expect(service.submitJob({ ...request, language: 'latin' })).rejects.toBeInstanceOf(
      GrpcInvalidArgumentException,
    );
  });
});
