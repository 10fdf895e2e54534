import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createWorker, OEM } from 'tesseract.js';
import { PageRecognizer } from './page-recognizer';
import {
  RECOGNITION_LANGUAGES,
  isRecognitionLanguage,
  normalizePageText,
  resolveRecognitionEngineOptions,
} from './recognition-options';

/**
 * tesseract.js recognizer. A worker is created per call and terminated when
 * the last page is done; pages are recognized one after another.
 */
@Injectable()
export class TesseractRecognizer extends PageRecognizer {
  private readonly logger = new Logger(TesseractRecognizer.name);

  constructor(private readonly configService: ConfigService) {
    super();
  }

  async recognize(images: Buffer[], language: string, useAccelerator: boolean): Promise<string[]> {
    const options = resolveRecognitionEngineOptions(this.configService);
    const traineddata = isRecognitionLanguage(language)
      ? RECOGNITION_LANGUAGES[language]
      : RECOGNITION_LANGUAGES.en;

    if (useAccelerator) {
      this.logger.warn('Accelerated recognition requested; tesseract.js runs on the CPU');
    }

    const worker = await createWorker(traineddata, OEM.LSTM_ONLY, {
      ...(options.langPath ? { langPath: options.langPath, cacheMethod: 'none' } : {}),
    });

    try {
      const texts: string[] = [];
      for (const [index, image] of images.entries()) {
        const { data } = await worker.recognize(image);
        texts.push(normalizePageText(data.text));
        this.logger.debug(`Recognized page ${index + 1}/${images.length}`);
      }
      return texts;
    } finally {
      await worker.terminate();
    }
  }
}
