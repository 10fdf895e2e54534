import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Logger,
  Param,
  Post,
  Res,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { memoryStorage } from 'multer';
import type { Response } from 'express';
import { CurrentUser, JwtAuthGuard, type RequestUser } from '../auth';
import { TasksService } from './tasks.service';
import { ProcessDocumentDto } from './dto/process-document.dto';
import type {
  ProcessAcceptedResponse,
  TaskPendingResponse,
  TaskResultResponse,
  TaskStatusResponse,
} from './dto/task-responses.dto';

/**
 * Multer configuration: memory storage so the buffer flows straight to the
 * object store without a temp file.
 *
 * The service enforces UPLOAD_MAX_FILE_SIZE_MB with a descriptive error;
 * Multer's cap only bounds what is buffered at all.
 */
const MULTER_OPTIONS = {
  storage: memoryStorage(),
  limits: {
    fileSize: 100 * 1024 * 1024,
  },
};

/**
 * Routes:
 *   POST /ocr/process            upload a document and start OCR
 *   GET  /ocr/status/:taskId     current status
 *   GET  /ocr/result/:taskId     recognized text once completed
 */
@Controller('ocr')
@UseGuards(JwtAuthGuard)
export class OcrController {
  private readonly logger = new Logger(OcrController.name);

  constructor(private readonly tasksService: TasksService) {}

  /**
   * Error responses:
   *   400 - No file attached, invalid language or use_gpu
   *   413 - File exceeds size limit
   *   415 - Unsupported file extension
   *   502 - Object store upload failure
   */
  @Post('process')
  @UseInterceptors(FileInterceptor('file', MULTER_OPTIONS))
  @HttpCode(HttpStatus.ACCEPTED)
  process(
    @UploadedFile() file: Express.Multer.File | undefined,
    @Body() dto: ProcessDocumentDto,
    @CurrentUser() user: RequestUser,
  ): Promise<ProcessAcceptedResponse> {
    this.logger.log(
      `Upload request from "${user.principal}": ` +
        `file="${file?.originalname ?? 'none'}", size=${file?.size ?? 0}`,
    );

    return this.tasksService.submit(file, dto, user.principal);
  }

  @Get('status/:taskId')
  status(
    @Param('taskId') taskId: string,
    @CurrentUser() user: RequestUser,
  ): Promise<TaskStatusResponse> {
    return this.tasksService.getStatus(taskId, user.principal);
  }

  /** 202 while processing, 422 once failed, 200 with the text once completed */
  @Get('result/:taskId')
  async result(
    @Param('taskId') taskId: string,
    @CurrentUser() user: RequestUser,
    @Res({ passthrough: true }) res: Response,
  ): Promise<TaskPendingResponse | TaskResultResponse> {
    const view = await this.tasksService.getResult(taskId, user.principal);
    if (view.kind === 'pending') {
      res.status(HttpStatus.ACCEPTED);
    }
    return view.body;
  }
}
