/**
 * src/shared/db/migrations/0001_create_users.ts
 *
 * WHY:
 * - Users are the only entity of this service.
 * - Email is unique across ALL rows (soft-deleted ones included), so a deleted
 *   user's email stays reserved. The service pre-checks active users only and
 *   remaps the index rejection to a conflict.
 * - (created_at, id) index serves the newest-first listing.
 *
 * RULES:
 * - Never drop rows from the API; deletion is the is_deleted flag.
 */

import { sql } from 'kysely';
import type { Kysely } from 'kysely';

export async function up(db: Kysely<any>): Promise<void> {
  await db.schema
    .createTable('users')
    .addColumn('id', 'serial', (col) => col.primaryKey())
    .addColumn('name', 'varchar(100)', (col) => col.notNull())
    .addColumn('email', 'varchar(255)', (col) => col.notNull().unique())
    .addColumn('is_deleted', 'boolean')
    .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
    .addColumn('updated_at', 'timestamptz')
    .execute();

  await db.schema
    .createIndex('users_created_at_id_idx')
    .on('users')
    .columns(['created_at', 'id'])
    .execute();
}

export async function down(db: Kysely<any>): Promise<void> {
  await db.schema.dropTable('users').ifExists().execute();
}
