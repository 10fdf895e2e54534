/** The extraction backend is unconfigured, unreachable, timed out or errored. */
export class ExtractionServiceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ExtractionServiceError';
  }
}
