import type { InvoiceFields } from '../interfaces/extracted-fields.interface';

/** Extract stage: one page of recognized text → invoice fields. */
export abstract class InvoiceFieldExtractor {
  /** @throws ExtractionServiceError when the backend cannot answer */
  abstract extract(pageText: string): Promise<InvoiceFields>;

  /** Whether credentials are present; reported by the health check. */
  abstract isConfigured(): boolean;
}
