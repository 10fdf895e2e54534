import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { StorageModule } from '@invoice-ocr/storage';
import { ConversionService } from './conversion/conversion.service';
import { MupdfRasterizer } from './conversion/mupdf-rasterizer';
import { PdfRasterizer } from './conversion/pdf-rasterizer';
import { PageRecognizer } from './recognition/page-recognizer';
import { TesseractRecognizer } from './recognition/tesseract-recognizer';
import { PipelineRunner } from './pipeline-runner';

/**
 * PipelineModule - Convert and Recognize stages plus the runner that chains
 * them. Imported by the gateway (inline dispatch) and the worker.
 */
@Module({
  imports: [ConfigModule, StorageModule],
  providers: [
    ConversionService,
    { provide: PdfRasterizer, useClass: MupdfRasterizer },
    { provide: PageRecognizer, useClass: TesseractRecognizer },
    PipelineRunner,
  ],
  exports: [PipelineRunner, StorageModule],
})
export class PipelineModule {}
