/** Renders every page of a PDF to a PNG, in page order. */
export abstract class PdfRasterizer {
  abstract render(pdf: Buffer, scale: number): Promise<Buffer[]>;
}
