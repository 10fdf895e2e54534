import { Injectable, Logger } from '@nestjs/common';
import { TaskStatus, TaskStore } from '@invoice-ocr/tasks';
import { TaskDispatcher } from '../dispatch/task-dispatcher';
import { TaskAccessService } from '../tasks/task-access.service';
import { TaskResultsNotFoundException } from '../tasks/exceptions/task.exceptions';
import { ExtractInvoiceDto } from './dto/extract-invoice.dto';
import {
  ExtractionFailedException,
  PageOutOfRangeException,
  TaskNotCompletedException,
} from './exceptions/invoice.exceptions';
import { InvoiceFieldExtractor } from './extraction/invoice-field-extractor';
import {
  emptyInvoiceFields,
  type ExtractedFields,
  type InvoiceExtractionResponse,
} from './interfaces/extracted-fields.interface';

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * InvoicesService - structured field extraction over a completed task's text.
 *
 * A single requested page fails the request (502); a whole-document run
 * keeps going past failing pages and reports each one in its entry.
 */
@Injectable()
export class InvoicesService {
  private readonly logger = new Logger(InvoicesService.name);

  constructor(
    private readonly store: TaskStore,
    private readonly dispatcher: TaskDispatcher,
    private readonly access: TaskAccessService,
    private readonly extractor: InvoiceFieldExtractor,
  ) {}

  async extract(dto: ExtractInvoiceDto, requester: string): Promise<InvoiceExtractionResponse> {
    const owned = await this.access.loadOwnedTask(dto.task_id, requester);
    const task = await this.dispatcher.reconcile(owned);

    if (task.status !== TaskStatus.COMPLETED) {
      throw new TaskNotCompletedException();
    }

    const result = await this.store.getResult(task.id);
    if (!result) {
      throw new TaskResultsNotFoundException(task.id);
    }

    const totalPages = result.pages.length;
    let invoiceData: ExtractedFields[];

    if (dto.page_number !== undefined) {
      if (dto.page_number > totalPages) {
        throw new PageOutOfRangeException(dto.page_number, totalPages);
      }
      invoiceData = [await this.extractSinglePage(task.id, result.pages, dto.page_number)];
    } else {
      invoiceData = [];
      for (let index = 0; index < totalPages; index++) {
        invoiceData.push(await this.extractPageSoftly(task.id, result.pages[index], index + 1));
      }
    }

    this.logger.log(`Extracted ${invoiceData.length} page(s) of task ${task.id}`);

    return {
      task_id: task.id,
      invoice_data: invoiceData,
      total_pages: totalPages,
      extraction_time: Date.now() / 1000,
    };
  }

  // ── Private methods ──────────────────────────────────────

  private async extractSinglePage(
    taskId: string,
    pages: string[],
    pageNumber: number,
  ): Promise<ExtractedFields> {
    try {
      const fields = await this.extractor.extract(pages[pageNumber - 1]);
      return { ...fields, page_number: pageNumber };
    } catch (error) {
      const message = messageOf(error);
      this.logger.error(`Extraction of page ${pageNumber} of task ${taskId} failed: ${message}`);
      throw new ExtractionFailedException(message);
    }
  }

  private async extractPageSoftly(
    taskId: string,
    pageText: string,
    pageNumber: number,
  ): Promise<ExtractedFields> {
    try {
      const fields = await this.extractor.extract(pageText);
      return { ...fields, page_number: pageNumber };
    } catch (error) {
      const message = messageOf(error);
      this.logger.warn(`Extraction of page ${pageNumber} of task ${taskId} failed: ${message}`);
      return { ...emptyInvoiceFields(), page_number: pageNumber, error: message };
    }
  }
}
