export { PipelineModule } from './pipeline.module';
export { PipelineRunner } from './pipeline-runner';
export type { PipelineJob } from './pipeline-runner';
export { PipelineExecutionError, RecognitionEngineConfigError } from './pipeline.errors';
export { ConversionService } from './conversion/conversion.service';
export { PdfRasterizer } from './conversion/pdf-rasterizer';
export { MupdfRasterizer } from './conversion/mupdf-rasterizer';
export { PageRecognizer } from './recognition/page-recognizer';
export { TesseractRecognizer } from './recognition/tesseract-recognizer';
export {
  RECOGNITION_LANGUAGES,
  SUPPORTED_LANGUAGES,
  isRecognitionLanguage,
  normalizePageText,
  resolveRecognitionEngineOptions,
} from './recognition/recognition-options';
export type {
  RecognitionLanguage,
  RecognitionEngineOptions,
} from './recognition/recognition-options';
