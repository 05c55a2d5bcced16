/**
 * backend/src/shared/http/error-handler.ts
 *
 * WHY:
 * - Fastify's default error handler doesn't understand AppError.
 * - We need consistent error responses across all endpoints (envelope shape).
 * - Internal details (meta, stack traces) must never leak to clients.
 *
 * RESPONSIBILITIES:
 * - AppError → map .status to the HTTP status + fail/error envelope.
 * - Zod validation errors → 422 (safety net if a controller misses).
 * - Fastify client errors (malformed JSON, body too large) → their own 4xx.
 * - Unexpected errors (store faults included) → 500 with a generic message.
 * - Unknown routes → 404 envelope.
 * - Log all errors with request context for debugging.
 *
 * RULES:
 * - No business logic here.
 * - Never expose .meta or stack traces in responses.
 */

import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';

import { AppError } from './errors';
import { failure } from './envelope';
import { toValidationIssues } from './validation';
import { withRequestContext } from '../logger/with-context';

const SENSITIVE_META_KEYS = new Set(['password', 'token', 'secret', 'authorization']);

export function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k.toLowerCase()) ? '[REDACTED]' : v;
  }
  return out;
}

function isClientError(err: FastifyError): err is FastifyError & { statusCode: number } {
  return typeof err.statusCode === 'number' && err.statusCode >= 400 && err.statusCode < 500;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler((err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
    const log = withRequestContext(req);

    // 1) Known application errors
    if (err instanceof AppError) {
      log.warn('app_error', {
        flow: 'http.error',
        code: err.code,
        status: err.status,
        message: err.message,
        meta: redactMeta(err.meta),
      });

      return reply.status(err.status).send(failure(err.status, err.message, err.issues));
    }

    // 2) Zod errors that escaped a controller
    if (err instanceof ZodError) {
      log.warn('validation_error', { flow: 'http.error', issues: err.issues.length });

      return reply.status(422).send(failure(422, 'Validation error', toValidationIssues(err)));
    }

    // 3) Framework-level client errors (bad JSON, unsupported media type, ...)
    if (isClientError(err)) {
      log.warn('client_error', {
        flow: 'http.error',
        code: err.code,
        status: err.statusCode,
        message: err.message,
      });

      return reply.status(err.statusCode).send(failure(err.statusCode, err.message));
    }

    // 4) Unexpected errors: never leak internals
    log.error('unhandled_error', {
      flow: 'http.error',
      message: err.message,
      stack: err.stack,
    });

    return reply.status(500).send(failure(500, 'Internal server error'));
  });

  app.setNotFoundHandler((req: FastifyRequest, reply: FastifyReply) => {
    withRequestContext(req).info('route_not_found', { flow: 'http.error' });

    return reply.status(404).send(failure(404, 'Route not found'));
  });
}
