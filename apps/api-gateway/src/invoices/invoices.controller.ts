import { Body, Controller, HttpCode, HttpStatus, Post, UseGuards } from '@nestjs/common';
import { CurrentUser, JwtAuthGuard, type RequestUser } from '../auth';
import { InvoicesService } from './invoices.service';
import { ExtractInvoiceDto } from './dto/extract-invoice.dto';
import type { InvoiceExtractionResponse } from './interfaces/extracted-fields.interface';

/**
 * Routes:
 *   POST /invoice/extract   invoice fields of one page or of every page
 */
@Controller('invoice')
@UseGuards(JwtAuthGuard)
export class InvoicesController {
  constructor(private readonly invoicesService: InvoicesService) {}

  /**
   * Error responses:
   *   400 - Task not completed, page out of range, invalid body
   *   403 - Task belongs to another principal
   *   404 - Unknown task or missing results
   *   502 - Extraction of the requested page failed
   */
  @Post('extract')
  @HttpCode(HttpStatus.OK)
  extract(
    @Body() dto: ExtractInvoiceDto,
    @CurrentUser() user: RequestUser,
  ): Promise<InvoiceExtractionResponse> {
    return this.invoicesService.extract(dto, user.principal);
  }
}
