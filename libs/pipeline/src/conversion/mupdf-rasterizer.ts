import { Injectable, Logger } from '@nestjs/common';
import { PdfRasterizer } from './pdf-rasterizer';

/**
 * PDF rendering through mupdf's WebAssembly build.
 *
 * mupdf ships as an ES module only, so it is loaded with a dynamic import on
 * first use instead of a top-level import.
 */
@Injectable()
export class MupdfRasterizer extends PdfRasterizer {
  private readonly logger = new Logger(MupdfRasterizer.name);

  async render(pdf: Buffer, scale: number): Promise<Buffer[]> {
    const { default: mupdf } = await import('mupdf');

    const doc = mupdf.Document.openDocument(pdf, 'application/pdf');
    try {
      const pageCount = doc.countPages();
      const matrix = mupdf.Matrix.scale(scale, scale);
      const pages: Buffer[] = [];

      for (let i = 0; i < pageCount; i++) {
        const page = doc.loadPage(i);
        const pixmap = page.toPixmap(matrix, mupdf.ColorSpace.DeviceRGB, false);
        pages.push(Buffer.from(pixmap.asPNG()));
        pixmap.destroy();
        page.destroy();
      }

      this.logger.debug(`Rendered ${pageCount} PDF page(s) at scale ${scale}`);
      return pages;
    } finally {
      doc.destroy();
    }
  }
}
