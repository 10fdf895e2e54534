import { ConfigService } from '@nestjs/config';
import {
  AzureOpenAiFieldExtractor,
  buildExtractionPrompt,
} from '../extraction/azure-openai-field-extractor';
import { ExtractionServiceError } from '../extraction/extraction.errors';

const mockCreate = jest.fn();
const mockClientOptions = jest.fn();

jest.mock('openai', () => ({
  AzureOpenAI: jest.fn().mockImplementation((options: unknown) => {
    mockClientOptions(options);
    return { chat: { completions: { create: mockCreate } } };
  }),
}));

const CONFIGURED = {
  AZURE_OPENAI_ENDPOINT: 'https://example.openai.azure.com',
  AZURE_OPENAI_KEY: 'test-secret',
};

describe('AzureOpenAiFieldExtractor', () => {
  beforeEach(() => {
    mockCreate.mockReset();
    mockClientOptions.mockReset();
  });

  it('refuses to run without credentials', async () => {
    const extractor = new AzureOpenAiFieldExtractor(new ConfigService({}));

    expect(extractor.isConfigured()).toBe(false);
    await expect(extractor.extract('text')).rejects.toThrow(
      new ExtractionServiceError('Azure OpenAI credentials are not configured'),
    );
    expect(mockCreate).not.toHaveBeenCalled();
  });

  it('sends one deterministic JSON-mode completion per page', async () => {
    mockCreate.mockResolvedValue({
      choices: [{ message: { content: '{"invoice_number":"INV-7","vendor_name":"Acme"}' } }],
    });
    const extractor = new AzureOpenAiFieldExtractor(new ConfigService(CONFIGURED));

    const fields = await extractor.extract('page text');

    expect(fields).toEqual({
      invoice_number: 'INV-7',
      invoice_date: '',
      vendor_name: 'Acme',
      customer_name: '',
      total_amount: '',
      tax_amount: '',
    });
    expect(mockCreate).toHaveBeenCalledWith({
      model: 'gpt-4o',
      messages: [{ role: 'user', content: buildExtractionPrompt('page text') }],
      temperature: 0,
      response_format: { type: 'json_object' },
    });
    expect(mockClientOptions).toHaveBeenCalledWith({
      endpoint: 'https://example.openai.azure.com',
      apiKey: 'test-secret',
      deployment: 'gpt-4o',
      apiVersion: '2024-08-01-preview',
      timeout: 60_000,
      maxRetries: 0,
    });
  });

  it('honours EXTRACTION_TIMEOUT_MS and reuses its client', async () => {
    mockCreate.mockResolvedValue({ choices: [] });
    const extractor = new AzureOpenAiFieldExtractor(
      new ConfigService({ ...CONFIGURED, EXTRACTION_TIMEOUT_MS: '5000' }),
    );

    await extractor.extract('a');
    const fields = await extractor.extract('b');

    expect(fields.invoice_number).toBe('');
    expect(mockClientOptions).toHaveBeenCalledTimes(1);
    expect(mockClientOptions).toHaveBeenCalledWith(expect.objectContaining({ timeout: 5000 }));
  });

  it('wraps transport failures', async () => {
    mockCreate.mockRejectedValue(new Error('socket hang up'));
    const extractor = new AzureOpenAiFieldExtractor(new ConfigService(CONFIGURED));

    await expect(extractor.extract('text')).rejects.toThrow(
      new ExtractionServiceError('Extraction request failed: socket hang up'),
    );
  });
});

describe('buildExtractionPrompt', () => {
  it('embeds the page text between the instructions', () => {
    expect(buildExtractionPrompt('TOTAL 42')).toContain('OCR Page Text:\nTOTAL 42\n\nReturn strict JSON');
  });
});
