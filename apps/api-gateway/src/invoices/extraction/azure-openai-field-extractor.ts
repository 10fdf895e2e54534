import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AzureOpenAI } from 'openai';
import type { InvoiceFields } from '../interfaces/extracted-fields.interface';
import { ExtractionServiceError } from './extraction.errors';
import { InvoiceFieldExtractor } from './invoice-field-extractor';
import { parseExtractionReply } from './parse-extraction-reply';

const DEFAULT_DEPLOYMENT = 'gpt-4o';
const DEFAULT_API_VERSION = '2024-08-01-preview';
const DEFAULT_TIMEOUT_MS = 60_000;

interface AzureCredentials {
  endpoint: string;
  apiKey: string;
  deployment: string;
}

export function buildExtractionPrompt(pageText: string): string {
  return (
    'You are an information extraction assistant. Given OCR text from an invoice page, ' +
    'extract the following fields as concise strings. If missing, return empty string. ' +
    'Fields: Invoice Number, Invoice Date, Vendor Name, Customer Name, Total Amount, Tax Amount.\n\n' +
    `OCR Page Text:\n${pageText}\n\n` +
    'Return strict JSON with keys: invoice_number, invoice_date, vendor_name, customer_name, total_amount, tax_amount.'
  );
}

/**
 * Invoice field extraction over Azure OpenAI chat completions.
 *
 * One request per page, temperature 0, JSON response format. The client is
 * created on first use so a gateway without credentials still boots and
 * reports the gap through /health.
 */
@Injectable()
export class AzureOpenAiFieldExtractor extends InvoiceFieldExtractor {
  private readonly logger = new Logger(AzureOpenAiFieldExtractor.name);
  private readonly apiVersion: string;
  private readonly timeoutMs: number;
  private client: AzureOpenAI | null = null;

  constructor(private readonly configService: ConfigService) {
    super();
    this.apiVersion = this.configService.get<string>('AZURE_OPENAI_API_VERSION', DEFAULT_API_VERSION);
    const timeout = Number(this.configService.get<string>('EXTRACTION_TIMEOUT_MS', String(DEFAULT_TIMEOUT_MS)));
    this.timeoutMs = Number.isFinite(timeout) && timeout > 0 ? timeout : DEFAULT_TIMEOUT_MS;
  }

  isConfigured(): boolean {
    return this.readCredentials() !== null;
  }

  async extract(pageText: string): Promise<InvoiceFields> {
    const credentials = this.readCredentials();
    if (!credentials) {
      throw new ExtractionServiceError('Azure OpenAI credentials are not configured');
    }

    let content: string;
    try {
      const completion = await this.getClient(credentials).chat.completions.create({
        model: credentials.deployment,
        messages: [{ role: 'user', content: buildExtractionPrompt(pageText) }],
        temperature: 0,
        response_format: { type: 'json_object' },
      });
      content = completion.choices[0]?.message?.content ?? '{}';
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.debug(`Completion request failed: ${message}`);
      throw new ExtractionServiceError(`Extraction request failed: ${message}`, { cause: error });
    }

    return parseExtractionReply(content);
  }

  // ── Private methods ──────────────────────────────────────

  private readCredentials(): AzureCredentials | null {
    const endpoint = this.configService.get<string>('AZURE_OPENAI_ENDPOINT', '').trim();
    const apiKey = this.configService.get<string>('AZURE_OPENAI_KEY', '').trim();
    const deployment = this.configService.get<string>('AZURE_DEPLOYMENT_NAME', DEFAULT_DEPLOYMENT).trim();

    if (!endpoint || !apiKey || !deployment) {
      return null;
    }
    return { endpoint, apiKey, deployment };
  }

  private getClient(credentials: AzureCredentials): AzureOpenAI {
    if (!this.client) {
      this.client = new AzureOpenAI({
        endpoint: credentials.endpoint,
        apiKey: credentials.apiKey,
        deployment: credentials.deployment,
        apiVersion: this.apiVersion,
        timeout: this.timeoutMs,
        maxRetries: 0,
      });
    }
    return this.client;
  }
}
