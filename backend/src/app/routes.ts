/**
 * backend/src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes:
 *   - core routes (/, /health)
 *   - module routes (users)
 *
 * RULES:
 * - No business logic here.
 * - Only wiring: app.get/post + handler functions.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { success } from '../shared/http/envelope';

export const SERVICE_VERSION = '0.1.0';

export type HealthPayload = {
  service: string;
  version: string;
  env: string;
  requestId: string;
};

export function registerRoutes(app: FastifyInstance, opts: { config: AppConfig; deps: AppDeps }) {
  // Health endpoint (E2E smoke + platform checks)
  const health = (req: FastifyRequest) =>
    success<HealthPayload>(
      {
        service: opts.config.serviceName,
        version: SERVICE_VERSION,
        env: opts.config.nodeEnv,
        requestId: req.requestContext.requestId,
      },
      'Users API is running!',
    );

  app.get('/', health);
  app.get('/health', health);

  // Module routes
  opts.deps.users.registerRoutes(app);
}
