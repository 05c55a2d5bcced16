import { buildApp } from '../../src/app/build-app';
import type { AppConfig } from '../../src/app/config';
import { createMemDb } from './mem-db';

/**
 * WHY:
 * - Build a Fastify app for E2E-style tests using app.inject().
 * - Keeps tests clean: build once, inject, close.
 *
 * RULES:
 * - Every call gets its own in-memory database (no shared state between tests).
 * - databaseUrl is never dialed; the db handle is injected.
 */
export async function buildTestApp(overrides: Partial<AppConfig> = {}) {
  const config: AppConfig = {
    nodeEnv: 'test',
    port: 0,
    host: '127.0.0.1',

    databaseUrl: 'postgres://unused@localhost/users_test',
    dbPoolMax: 1,

    logLevel: process.env.LOG_LEVEL ?? 'error',
    serviceName: 'users-api',

    ...overrides,
  };

  const db = await createMemDb();
  const built = await buildApp(config, { db });

  return {
    app: built.app,
    deps: built.deps,
    close: built.close,
  };
}
