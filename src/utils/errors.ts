/**
 * Custom Application Error class
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    statusCode: number = 500,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true
  ) {
    super(message);

    this.name = 'AppError';
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation Error
 */
export class ValidationError extends AppError {
  public readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    this.details = details;
  }
}

export type EngineErrorKind =
  | 'UnsupportedFormat'
  | 'CorruptAudio'
  | 'EmptyAudio'
  | 'UnsupportedLanguage';

/**
 * Base class for failures raised by the detection engine.
 * Carries no HTTP semantics; the error handler maps `kind` to a response.
 */
export abstract class EngineError extends Error {
  abstract readonly kind: EngineErrorKind;

  constructor(message: string) {
    super(message);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class UnsupportedFormatError extends EngineError {
  readonly kind = 'UnsupportedFormat';

  constructor(public readonly format: string) {
    super(`Unsupported audio format: ${format}`);
    this.name = 'UnsupportedFormatError';
  }
}

export class CorruptAudioError extends EngineError {
  readonly kind = 'CorruptAudio';

  constructor(message: string) {
    super(message);
    this.name = 'CorruptAudioError';
  }
}

export class EmptyAudioError extends EngineError {
  readonly kind = 'EmptyAudio';

  constructor() {
    super('Decoded audio contains no samples');
    this.name = 'EmptyAudioError';
  }
}

export class UnsupportedLanguageError extends EngineError {
  readonly kind = 'UnsupportedLanguage';

  constructor(public readonly language: string) {
    super(`Unsupported language: ${language}`);
    this.name = 'UnsupportedLanguageError';
  }
}
