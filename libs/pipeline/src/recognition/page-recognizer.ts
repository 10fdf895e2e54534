/** Recognize stage: one text per image, same order; blank pages yield "". */
export abstract class PageRecognizer {
  abstract recognize(images: Buffer[], language: string, useAccelerator: boolean): Promise<string[]>;
}
