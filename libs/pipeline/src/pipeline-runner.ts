import { Injectable, Logger } from '@nestjs/common';
import { ResultAggregator, type TaskResult } from '@invoice-ocr/tasks';
import {
  StorageService,
  extensionOf,
  jsonArtifactName,
  pageImageName,
  textArtifactName,
} from '@invoice-ocr/storage';
import { ConversionService } from './conversion/conversion.service';
import { PageRecognizer } from './recognition/page-recognizer';
import { PipelineExecutionError } from './pipeline.errors';

export interface PipelineJob {
  taskId: string;
  storedFilename: string;
  language: string;
  useAccelerator: boolean;
}

/**
 * Runs one task end to end: download → convert → recognize → aggregate,
 * strictly in sequence, storing the page images and the text artifacts.
 *
 * Any stage failure is rethrown as PipelineExecutionError carrying the
 * original message.
 */
@Injectable()
export class PipelineRunner {
  private readonly logger = new Logger(PipelineRunner.name);

  constructor(
    private readonly storage: StorageService,
    private readonly conversion: ConversionService,
    private readonly recognizer: PageRecognizer,
  ) {}

  async run(job: PipelineJob): Promise<TaskResult> {
    const { taskId, storedFilename } = job;
    const ext = extensionOf(storedFilename);

    const input = await this.stage(taskId, 'download', () =>
      this.storage.downloadUpload(storedFilename),
    );

    const images = await this.stage(taskId, 'convert', () => this.conversion.convert(input, ext));
    if (images.length === 0) {
      throw new PipelineExecutionError(`No pages could be produced from ".${ext}" input`, 'convert');
    }

    const paginated = ext === 'pdf';
    await this.stage(taskId, 'store-pages', async () => {
      for (const [index, image] of images.entries()) {
        await this.storage.putArtifact(
          pageImageName(storedFilename, index + 1, paginated),
          image,
          'image/png',
        );
      }
    });

    const texts = await this.stage(taskId, 'recognize', () =>
      this.recognizer.recognize(images, job.language, job.useAccelerator),
    );
    if (texts.length !== images.length) {
      throw new PipelineExecutionError(
        `Recognition returned ${texts.length} page(s) for ${images.length} image(s)`,
        'recognize',
      );
    }

    const result = ResultAggregator.aggregate(texts);

    await this.stage(taskId, 'store-text', async () => {
      await this.storage.putArtifact(
        textArtifactName(storedFilename),
        Buffer.from(result.fullText, 'utf8'),
        'text/plain; charset=utf-8',
      );
      await this.storage.putArtifact(
        jsonArtifactName(storedFilename),
        Buffer.from(JSON.stringify({ pages: result.pages }, null, 2), 'utf8'),
        'application/json',
      );
    });

    this.logger.log(`Task ${taskId}: pipeline finished with ${result.pagesProcessed} page(s)`);
    return result;
  }

  private async stage<T>(taskId: string, name: string, work: () => Promise<T>): Promise<T> {
    this.logger.debug(`Task ${taskId}: ${name}`);
    try {
      return await work();
    } catch (error) {
      if (error instanceof PipelineExecutionError) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new PipelineExecutionError(message, name, { cause: error });
    }
  }
}
