/**
 * backend/src/shared/db/schema.ts
 *
 * WHY:
 * - Kysely needs a typed view of the tables to type-check queries.
 * - Migrations define the schema; these interfaces mirror them.
 *
 * RULES:
 * - Keep aligned with src/shared/db/migrations (snake_case column names).
 * - Only DAL/queries import these row types. Modules expose domain types.
 */

import type { ColumnType, Generated } from 'kysely';

export interface Users {
  id: Generated<number>;
  name: string;
  email: string;

  // null/false = active, true = soft-deleted
  is_deleted: boolean | null;

  created_at: ColumnType<Date, Date | undefined, never>;
  updated_at: ColumnType<Date | null, Date | null | undefined, Date | null>;
}

export interface DB {
  users: Users;
}
