/**
 * src/shared/db/migrations/index.ts
 *
 * Ordered registry of schema migrations. Add new files here, keyed by file name.
 */

import type { Migration } from 'kysely';

import * as m0001 from './0001_create_users';

export const migrations: Record<string, Migration> = {
  '0001_create_users': m0001,
};
