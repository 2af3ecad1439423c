// Domain-specific error types for the roadmap generator

/**
 * Base error class for all application errors
 */
export abstract class AppError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string, public readonly context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * User-correctable input errors, reported against a single form field
 */
export class ValidationError extends AppError {
  readonly code = 'VALIDATION_ERROR';
  readonly statusCode = 400;

  constructor(message: string, public readonly field?: string, context?: Record<string, unknown>) {
    super(message, { ...context, field });
  }
}

/**
 * Not found errors
 */
export class NotFoundError extends AppError {
  readonly code = 'NOT_FOUND';
  readonly statusCode = 404;

  constructor(resourceType: string, id: string | number) {
    super(`${resourceType} not found: ${id}`, { resourceType, id });
  }
}

/**
 * Failure categories for a roadmap generation attempt
 */
export type GenerationErrorKind = 'ProviderUnavailable' | 'ProviderRejected' | 'MalformedResponse';

/**
 * Errors raised while calling the provider or interpreting its reply
 */
export class GenerationError extends AppError {
  readonly code = 'GENERATION_ERROR';
  readonly statusCode = 502;

  constructor(
    public readonly kind: GenerationErrorKind,
    message: string,
    context?: Record<string, unknown>
  ) {
    super(message, { ...context, kind });
  }

  /**
   * Only transient provider conditions are worth another attempt
   */
  get retryable(): boolean {
    return this.kind === 'ProviderUnavailable';
  }
}

/**
 * Storage errors
 */
export class PersistenceError extends AppError {
  readonly code = 'PERSISTENCE_ERROR';
  readonly statusCode = 500;
}

/**
 * Startup configuration errors
 */
export class ConfigurationError extends AppError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly statusCode = 500;

  constructor(message: string, public readonly missing: string[] = []) {
    super(message, { missing });
  }
}
