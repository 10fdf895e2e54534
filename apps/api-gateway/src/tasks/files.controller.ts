import { Controller, Get, Param, StreamableFile, UseGuards } from '@nestjs/common';
import { extensionOf } from '@invoice-ocr/storage';
import { CurrentUser, JwtAuthGuard, type RequestUser } from '../auth';
import { TasksService } from './tasks.service';

const CONTENT_TYPES: Record<string, string> = {
  png: 'image/png',
  txt: 'text/plain; charset=utf-8',
  json: 'application/json',
};

/** GET /files/:taskId/download/:filename - a derived artifact as an attachment */
@Controller('files')
@UseGuards(JwtAuthGuard)
export class FilesController {
  constructor(private readonly tasksService: TasksService) {}

  @Get(':taskId/download/:filename')
  async download(
    @Param('taskId') taskId: string,
    @Param('filename') filename: string,
    @CurrentUser() user: RequestUser,
  ): Promise<StreamableFile> {
    const stream = await this.tasksService.openArtifact(taskId, filename, user.principal);

    return new StreamableFile(stream, {
      type: CONTENT_TYPES[extensionOf(filename)] ?? 'application/octet-stream',
      disposition: `attachment; filename="${filename}"`,
    });
  }
}
