export const INVOICE_FIELD_NAMES = [
  'invoice_number',
  'invoice_date',
  'vendor_name',
  'customer_name',
  'total_amount',
  'tax_amount',
] as const;

export type InvoiceFieldName = (typeof INVOICE_FIELD_NAMES)[number];

/** Extracted invoice fields; a field that was not found is "". */
export type InvoiceFields = Record<InvoiceFieldName, string>;

/** One entry of the extract response, per page. */
export interface ExtractedFields extends InvoiceFields {
  page_number: number;
  /** Present only when extraction of this page failed */
  error?: string;
}

export interface InvoiceExtractionResponse {
  task_id: string;
  invoice_data: ExtractedFields[];
  total_pages: number;
  /** Unix time in seconds at which the extraction finished */
  extraction_time: number;
}

export function emptyInvoiceFields(): InvoiceFields {
  return {
    invoice_number: '',
    invoice_date: '',
    vendor_name: '',
    customer_name: '',
    total_amount: '',
    tax_amount: '',
  };
}
