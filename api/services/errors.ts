export type PipelineErrorCode =
  | 'configuration_error'
  | 'encoder_unavailable'
  | 'disambiguator_unavailable';

export class PipelineStageError extends Error {
  code: PipelineErrorCode;
  recoverable: boolean;
  details?: Record<string, unknown>;

  constructor(code: PipelineErrorCode, message: string, recoverable: boolean, details?: Record<string, unknown>) {
    super(message);
    this.name = 'PipelineStageError';
    this.code = code;
    this.recoverable = recoverable;
    this.details = details;
  }
}

/** Bad configuration or an invalid catalog file. */
export class ConfigurationError extends PipelineStageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('configuration_error', message, false, details);
    this.name = 'ConfigurationError';
  }
}

/** Every chunk needs the encoder, so this aborts the whole request. */
export class EncoderUnavailableError extends PipelineStageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('encoder_unavailable', message, false, details);
    this.name = 'EncoderUnavailableError';
  }
}

export class DisambiguatorError extends PipelineStageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('disambiguator_unavailable', message, true, details);
    this.name = 'DisambiguatorError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : 'Unknown error';
}

export function isPipelineStageError(error: unknown): error is PipelineStageError {
  return error instanceof PipelineStageError;
}
