import { Injectable } from '@nestjs/common';
import { HealthIndicator, type HealthIndicatorResult } from '@nestjs/terminus';
import { InvoiceFieldExtractor } from '../invoices/extraction/invoice-field-extractor';

/**
 * Reports whether extraction credentials are present. Never fails the
 * check: OCR keeps working without the extraction backend.
 */
@Injectable()
export class ExtractionHealthIndicator extends HealthIndicator {
  constructor(private readonly extractor: InvoiceFieldExtractor) {
    super();
  }

  check(key: string): HealthIndicatorResult {
    return this.getStatus(key, true, { configured: this.extractor.isConfigured() });
  }
}
