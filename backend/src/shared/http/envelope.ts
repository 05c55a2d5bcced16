/**
 * backend/src/shared/http/envelope.ts
 *
 * WHY:
 * - Every response body has the same outer shape: { status, message, data }.
 * - The HTTP status code is set separately (reply.status) per outcome.
 *
 * RULES:
 * - `data` is already a plain JSON shape. Modules own their serializers
 *   (e.g. users/user.responses.ts); nothing here inspects payloads.
 * - "fail" = client error (4xx), "error" = server error (5xx).
 */

import type { ValidationIssue } from './errors';

export type EnvelopeStatus = 'success' | 'fail' | 'error';

export type Envelope<T> = {
  status: EnvelopeStatus;
  message: string;
  data: T | null;
};

export type SuccessEnvelope<T> = Envelope<T> & { status: 'success' };

export type ErrorEnvelope = Envelope<ValidationIssue[]> & { status: 'fail' | 'error' };

export function success<T>(data: T, message = 'Success'): SuccessEnvelope<T> {
  return { status: 'success', message, data };
}

export function created<T>(data: T, message = 'Created'): SuccessEnvelope<T> {
  return success(data, message);
}

export function acknowledged(message: string): SuccessEnvelope<never> {
  return { status: 'success', message, data: null };
}

export function failure(
  httpStatus: number,
  message: string,
  issues?: ValidationIssue[],
): ErrorEnvelope {
  return {
    status: httpStatus >= 500 ? 'error' : 'fail',
    message,
    data: issues && issues.length > 0 ? issues : null,
  };
}
