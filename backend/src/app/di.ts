/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db pool) and shares them safely.
 * - Modules receive handles explicitly; nothing is a module-level singleton.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Tests inject their own `db` (in-memory Postgres) through `overrides`.
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';
import type { Db } from '../shared/db/db';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { createUserModule } from '../modules/users';
import type { UserModule } from '../modules/users';

export type AppDeps = {
  db: Db;
  logger: Logger;

  // modules
  users: UserModule;

  // lifecycle
  close: () => Promise<void>;
};

export type DepsOverrides = {
  db?: Db;
};

export function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): AppDeps {
  const db =
    overrides.db ?? createDb({ databaseUrl: config.databaseUrl, poolMax: config.dbPoolMax });

  // modules (no HTTP / no business logic here)
  const users = createUserModule({ db, logger });

  return {
    db,
    logger,
    users,
    close: async () => {
      await db.destroy();
    },
  };
}
