import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import sharp from 'sharp';
import { PdfRasterizer } from './pdf-rasterizer';

/** Raster formats re-encoded to a single PNG */
const RASTER_EXTENSIONS = new Set(['jpg', 'jpeg', 'tif', 'tiff', 'webp']);

const DEFAULT_PDF_RENDER_SCALE = 2;

/**
 * Convert stage: input bytes → ordered page images (PNG).
 *
 * - png        passes through untouched (the very same buffer)
 * - raster     one PNG, RGB without alpha
 * - pdf        one PNG per page, rendered at PDF_RENDER_SCALE
 * - otherwise  no pages
 */
@Injectable()
export class ConversionService {
  private readonly logger = new Logger(ConversionService.name);
  private readonly pdfScale: number;

  constructor(
    private readonly rasterizer: PdfRasterizer,
    configService: ConfigService,
  ) {
    const scale = Number(configService.get<string>('PDF_RENDER_SCALE', String(DEFAULT_PDF_RENDER_SCALE)));
    this.pdfScale = Number.isFinite(scale) && scale > 0 ? scale : DEFAULT_PDF_RENDER_SCALE;
  }

  async convert(input: Buffer, extension: string): Promise<Buffer[]> {
    const ext = extension.replace(/^\./, '').toLowerCase();

    if (ext === 'png') {
      return [input];
    }

    if (RASTER_EXTENSIONS.has(ext)) {
      const png = await sharp(input).toColourspace('srgb').removeAlpha().png().toBuffer();
      return [png];
    }

    if (ext === 'pdf') {
      return this.rasterizer.render(input, this.pdfScale);
    }

    this.logger.debug(`No converter for ".${ext}" input`);
    return [];
  }
}
