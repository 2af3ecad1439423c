// Input validation for form submissions and route parameters

import { ZodError } from 'zod';
import { GenerationRequest } from '../models/roadmap.js';
import { NotFoundError, ValidationError } from './errors.js';
import { GenerationFormSchema } from './schemas.js';

const ROADMAP_ID_PATTERN = /^[1-9]\d{0,11}$/;

/**
 * Converts the first zod issue into a field-level ValidationError
 */
export function toValidationError(error: ZodError): ValidationError {
  const issue = error.issues[0];
  if (!issue) {
    return new ValidationError('Invalid input');
  }
  const field = issue.path.length > 0 ? String(issue.path[0]) : undefined;
  return new ValidationError(issue.message, field, {
    issues: error.issues.map(i => ({ path: i.path.join('.'), message: i.message }))
  });
}

/**
 * Validates a raw form submission
 *
 * @throws ValidationError naming the first offending field
 */
export function validateGenerationForm(raw: unknown): GenerationRequest {
  const result = GenerationFormSchema.safeParse(raw);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Parses a roadmap ID taken from a URL or the command line.
 * A malformed ID cannot name a stored roadmap, so it is reported as not found.
 */
export function validateRoadmapId(raw: string): number {
  const trimmed = raw.trim();
  if (!ROADMAP_ID_PATTERN.test(trimmed)) {
    throw new NotFoundError('Roadmap', raw);
  }
  return Number(trimmed);
}
