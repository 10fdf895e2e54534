import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { StorageModule } from '@invoice-ocr/storage';
import { DispatchModule } from '../dispatch/dispatch.module';
import { TaskAccessService } from './task-access.service';
import { TasksService } from './tasks.service';
import { OcrController } from './ocr.controller';
import { TasksController } from './tasks.controller';
import { FilesController } from './files.controller';

/**
 * TasksModule - upload, status, result, listing, deletion and downloads.
 *
 * TaskStore comes from the global TaskStoreModule; TaskAccessService is
 * exported for the invoice extraction routes.
 */
@Module({
  imports: [ConfigModule, StorageModule, DispatchModule],
  controllers: [OcrController, TasksController, FilesController],
  providers: [TaskAccessService, TasksService],
  exports: [TaskAccessService],
})
export class TasksModule {}
