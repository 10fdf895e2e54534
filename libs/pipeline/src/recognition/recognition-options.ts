import { statSync } from 'fs';
import type { ConfigService } from '@nestjs/config';
import { RecognitionEngineConfigError } from '../pipeline.errors';

/** Public language codes → traineddata names */
export const RECOGNITION_LANGUAGES = {
  en: 'eng',
  ch: 'chi_sim',
  fr: 'fra',
  german: 'deu',
  korean: 'kor',
  japan: 'jpn',
} as const;

export type RecognitionLanguage = keyof typeof RECOGNITION_LANGUAGES;

export const SUPPORTED_LANGUAGES = Object.keys(RECOGNITION_LANGUAGES);

export function isRecognitionLanguage(value: unknown): value is RecognitionLanguage {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(RECOGNITION_LANGUAGES, value);
}

export interface RecognitionEngineOptions {
  /** Directory holding <lang>.traineddata; undefined means download on demand */
  langPath?: string;
}

const TRUTHY = new Set(['1', 'true', 'yes', 'on']);

function flag(configService: ConfigService, key: string): boolean {
  return TRUTHY.has(configService.get<string>(key, '').trim().toLowerCase());
}

function isDirectory(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isDirectory() ?? false;
}

/**
 * Reads OCR_USE_LOCAL_MODELS / OCR_MODEL_DIR / OCR_DISABLE_DOWNLOAD.
 *
 * @throws RecognitionEngineConfigError when local models are requested
 *   without a directory, the directory is missing, or downloads are
 *   disabled without one
 */
export function resolveRecognitionEngineOptions(configService: ConfigService): RecognitionEngineOptions {
  const useLocal = flag(configService, 'OCR_USE_LOCAL_MODELS');
  const modelDir = configService.get<string>('OCR_MODEL_DIR', '').trim();

  if (useLocal && !modelDir) {
    throw new RecognitionEngineConfigError('OCR_USE_LOCAL_MODELS is set but OCR_MODEL_DIR is empty.');
  }

  if (modelDir) {
    if (!isDirectory(modelDir)) {
      throw new RecognitionEngineConfigError(
        `OCR_MODEL_DIR not found at ${modelDir}. Set a correct path or unset OCR_USE_LOCAL_MODELS.`,
      );
    }
    return { langPath: modelDir };
  }

  if (flag(configService, 'OCR_DISABLE_DOWNLOAD')) {
    throw new RecognitionEngineConfigError(
      'Recognition model download is disabled and no local model directory is provided. ' +
        'Set OCR_MODEL_DIR or enable downloads.',
    );
  }

  return {};
}

/** Trims every line and drops the empty ones. */
export function normalizePageText(raw: string): string {
  return raw
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .join('\n');
}
