import type { ZodIssue, ZodType, ZodTypeDef } from 'zod';
import { ConfigValidationError } from '../errors';

export interface ValidationError {
  path: string;
  message: string;
}

export interface ParseOptions {
  message?: string;
}

/**
 * Parses input against a Zod schema, throwing ConfigValidationError on failure.
 * Returns the parsed value on success.
 */
export function parseOrThrow<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  input: unknown,
  options?: ParseOptions,
): T {
  const result = schema.safeParse(input);

  if (result.success) {
    return result.data;
  }

  throw new ConfigValidationError(
    options?.message ?? 'Invalid configuration',
    result.error.issues.map(toValidationError).sort(byPathThenMessage),
  );
}

function toValidationError(issue: ZodIssue): ValidationError {
  return {
    path: issue.path.length > 0 ? issue.path.join('.') : issue.code,
    message: issue.message,
  };
}

function byPathThenMessage(a: ValidationError, b: ValidationError): number {
  return a.path.localeCompare(b.path) || a.message.localeCompare(b.message);
}
