// CLI error handling utilities

import {
  AppError,
  ConfigurationError,
  GenerationError,
  NotFoundError,
  ValidationError
} from '../../core/errors.js';

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ValidationError) {
    const field = error.field ? ` (field: ${error.field})` : '';
    return `Validation Error${field}: ${error.message}`;
  }

  if (error instanceof NotFoundError) {
    return `Not Found: ${error.message}`;
  }

  if (error instanceof GenerationError) {
    return `Generation Error [${error.kind}]: ${error.message}`;
  }

  if (error instanceof ConfigurationError) {
    const missing = error.missing.length > 0 ? `\n  Set: ${error.missing.join(', ')}` : '';
    return `Configuration Error: ${error.message}${missing}`;
  }

  if (error instanceof AppError) {
    return `Error [${error.code}]: ${error.message}`;
  }

  if (error instanceof Error) {
    return `Error: ${error.message}`;
  }

  return `Unknown error: ${String(error)}`;
}

/**
 * Exit code for an error type
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof ValidationError) return 2;
  if (error instanceof NotFoundError) return 4;
  if (error instanceof GenerationError) return 5;
  if (error instanceof ConfigurationError) return 6;
  return 1;
}

/**
 * Handle CLI errors with proper exit codes
 */
export function handleError(error: unknown): never {
  console.error(`\n❌ ${formatError(error)}\n`);
  process.exit(exitCodeFor(error));
}

/**
 * Wrap an async CLI action with error handling
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

/**
 * Print success message
 */
export function success(message: string): void {
  console.log(`✓ ${message}`);
}
