import { ConfigService } from '@nestjs/config';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { RecognitionEngineConfigError } from '../pipeline.errors';
import {
  isRecognitionLanguage,
  normalizePageText,
  resolveRecognitionEngineOptions,
} from '../recognition/recognition-options';

describe('recognition options', () => {
  let modelDir: string;

  beforeAll(() => {
    modelDir = mkdtempSync(join(tmpdir(), 'ocr-models-'));
  });

  afterAll(() => {
    rmSync(modelDir, { recursive: true, force: true });
  });

  it('downloads models by default', () => {
    expect(resolveRecognitionEngineOptions(new ConfigService({}))).toEqual({});
  });

  it('uses a configured local model directory', () => {
    const config = new ConfigService({ OCR_USE_LOCAL_MODELS: 'true', OCR_MODEL_DIR: modelDir });
    expect(resolveRecognitionEngineOptions(config)).toEqual({ langPath: modelDir });
  });

  it('fails fast when the model directory is missing', () => {
    const missing = join(modelDir, 'missing');
    const config = new ConfigService({ OCR_MODEL_DIR: missing });

    expect(() => resolveRecognitionEngineOptions(config)).toThrow(
      `OCR_MODEL_DIR not found at ${missing}. Set a correct path or unset OCR_USE_LOCAL_MODELS.`,
    );
  });

  it('requires a directory when local models are requested', () => {
    const config = new ConfigService({ OCR_USE_LOCAL_MODELS: '1' });

    expect(() => resolveRecognitionEngineOptions(config)).toThrow(
      'OCR_USE_LOCAL_MODELS is set but OCR_MODEL_DIR is empty.',
    );
  });

  it('fails fast when downloads are disabled without local models', () => {
    const config = new ConfigService({ OCR_DISABLE_DOWNLOAD: 'yes' });

    expect(() => resolveRecognitionEngineOptions(config)).toThrow(RecognitionEngineConfigError);
  });

  it('accepts only the public language codes', () => {
    expect(isRecognitionLanguage('german')).toBe(true);
    expect(isRecognitionLanguage('de')).toBe(false);
    expect(isRecognitionLanguage('toString')).toBe(false);
  });

  it('keeps trimmed non-empty lines', () => {
    expect(normalizePageText('  Invoice 42 \n\n\tTotal: 10.00\r\n   \n')).toBe(
      'Invoice 42\nTotal: 10.00',
    );
    expect(normalizePageText('   ')).toBe('');
  });
});
