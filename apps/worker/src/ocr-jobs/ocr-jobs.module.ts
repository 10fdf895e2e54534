import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { PipelineModule } from '@invoice-ocr/pipeline';
import { OcrJobsController } from './ocr-jobs.controller';
import { OcrJobsService } from './ocr-jobs.service';
import { JobRegistry } from './job-registry';

/**
 * Registers the controller implementing OcrJobService and the job registry.
 *
 * REDIS_CLIENT comes from the global RedisModule registered in the
 * worker's AppModule.
 */
@Module({
  imports: [ConfigModule, PipelineModule],
  controllers: [OcrJobsController],
  providers: [OcrJobsService, JobRegistry],
  exports: [OcrJobsService],
})
export class OcrJobsModule {}
