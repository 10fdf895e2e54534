/** A pipeline stage failed; the message is what the task records as its error. */
export class PipelineExecutionError extends Error {
  constructor(
    message: string,
    readonly stage: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'PipelineExecutionError';
  }
}

/** The recognition engine cannot be created with the current configuration. */
export class RecognitionEngineConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RecognitionEngineConfigError';
  }
}
