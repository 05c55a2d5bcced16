/**
 * backend/src/shared/http/validation.ts
 *
 * WHY:
 * - Controllers validate body/params/query with Zod and throw AppError.
 * - One helper so every endpoint reports issues the same way.
 */

import type { ZodError, ZodType, ZodTypeDef } from 'zod';

import { AppError, type ValidationIssue } from './errors';

export function toValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Parses `input` or throws a 422 AppError carrying the issues.
 */
export function parseOrThrow<Output, Input>(
  schema: ZodType<Output, ZodTypeDef, Input>,
  input: unknown,
  message: string,
): Output {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw AppError.validationError(message, toValidationIssues(parsed.error));
  }
  return parsed.data;
}
