/**
 * Raised when a subtitle file cannot be found or read. Fatal for the pipeline.
 */
export class SubtitleFileError extends Error {
  readonly filePath: string;

  constructor(filePath: string, message: string) {
    super(`${message}: ${filePath}`);
    this.name = 'SubtitleFileError';
    this.filePath = filePath;
  }
}

/**
 * Raised when the selected translation provider has no usable credentials.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised between batches when the caller aborts a translation run.
 */
export class PipelineCancelledError extends Error {
  readonly completedBatches: number;

  constructor(completedBatches: number) {
    super(`Translation cancelled after ${completedBatches} batch(es)`);
    this.name = 'PipelineCancelledError';
    this.completedBatches = completedBatches;
  }
}

/**
 * Normalizes an unknown thrown value into a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
