import { Kysely, PostgresDialect } from 'kysely';
import { newDb } from 'pg-mem';

import type { Db } from '../../src/shared/db/db';
import type { DB } from '../../src/shared/db/schema';
import { migrations } from '../../src/shared/db/migrations';

/**
 * WHY:
 * - Tests must not need a running Postgres.
 * - pg-mem emulates Postgres in-process; we talk to it through the real
 *   Kysely PostgresDialect, so DAL code runs unchanged.
 *
 * RULES:
 * - One fresh database per call (ids start at 1 again).
 * - Schema comes from the real migrations, never from test-only DDL.
 */
export async function createMemDb(): Promise<Db> {
  const mem = newDb();
  const { Pool } = mem.adapters.createPg();

  const db = new Kysely<DB>({
    dialect: new PostgresDialect({ pool: new Pool() }),
  });

  for (const migration of Object.values(migrations)) {
    await migration.up(db);
  }

  return db;
}
