/**
 * backend/src/shared/http/request-context.ts
 *
 * WHY:
 * - We want a stable requestId for logs, debugging, and tracing.
 * - Callers may pass their own x-request-id (e.g. from a proxy); we keep it.
 *
 * HOW TO USE:
 * - Registered once in app/server.ts via registerRequestContext(app).
 * - After registration, every request has `req.requestContext`.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { randomUUID } from 'node:crypto';

export const REQUEST_ID_HEADER = 'x-request-id';

export type RequestContext = {
  requestId: string;
  host: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    requestContext: RequestContext;
  }
}

function parseHost(rawHost: unknown): string | null {
  if (typeof rawHost !== 'string') return null;

  const trimmed = rawHost.trim();
  if (!trimmed) return null;

  // strip port if present (e.g., "localhost:8000")
  return trimmed.split(':')[0]?.toLowerCase() ?? null;
}

function parseRequestId(raw: unknown): string | null {
  if (typeof raw !== 'string') return null;
  const trimmed = raw.trim();
  // bounded so a caller can't blow up log lines
  if (!trimmed || trimmed.length > 128) return null;
  return trimmed;
}

export function registerRequestContext(app: FastifyInstance) {
  app.decorateRequest('requestContext', null);

  // IMPORTANT: Fastify hooks must either be async OR accept `done`.
  app.addHook('onRequest', (req: FastifyRequest, reply, done) => {
    const requestId = parseRequestId(req.headers[REQUEST_ID_HEADER]) ?? randomUUID();

    req.requestContext = {
      requestId,
      host: parseHost(req.headers.host),
    };

    void reply.header(REQUEST_ID_HEADER, requestId);

    done();
  });
}
