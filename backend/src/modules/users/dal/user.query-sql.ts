/**
 * backend/src/modules/users/dal/user.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for users (raw SQL access).
 * - Every read here sees ACTIVE rows only (is_deleted null/false).
 *   There is no raw "include deleted" lookup on purpose.
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - No transactions started here.
 */

import type { ExpressionBuilder, Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { DB, Users } from '../../../shared/db/schema';
import { normalizeEmail } from '../helpers/normalize-email';

export type UserRow = Selectable<Users>;

/**
 * `is_deleted IS NULL OR is_deleted = false`. Shared with UserRepo so writes
 * never touch a soft-deleted row.
 */
export function whereActive(eb: ExpressionBuilder<DB, 'users'>) {
  return eb.or([eb('is_deleted', 'is', null), eb('is_deleted', '=', false)]);
}

export async function selectActiveUserByIdSql(
  db: DbExecutor,
  userId: number,
): Promise<UserRow | undefined> {
  return db
    .selectFrom('users')
    .selectAll()
    .where('id', '=', userId)
    .where(whereActive)
    .executeTakeFirst();
}

export async function selectActiveUserByEmailSql(
  db: DbExecutor,
  email: string,
): Promise<UserRow | undefined> {
  return db
    .selectFrom('users')
    .selectAll()
    .where('email', '=', normalizeEmail(email))
    .where(whereActive)
    .executeTakeFirst();
}

export async function selectActiveUserIdByEmailSql(
  db: DbExecutor,
  params: { email: string; excludeUserId?: number },
): Promise<{ id: number } | undefined> {
  let query = db
    .selectFrom('users')
    .select('id')
    .where('email', '=', normalizeEmail(params.email))
    .where(whereActive);

  if (params.excludeUserId !== undefined) {
    query = query.where('id', '!=', params.excludeUserId);
  }

  return query.executeTakeFirst();
}

/**
 * Newest first; id breaks created_at ties so pages are deterministic.
 */
export async function selectActiveUsersPageSql(
  db: DbExecutor,
  params: { limit: number; offset: number },
): Promise<UserRow[]> {
  return db
    .selectFrom('users')
    .selectAll()
    .where(whereActive)
    .orderBy('created_at', 'desc')
    .orderBy('id', 'desc')
    .limit(params.limit)
    .offset(params.offset)
    .execute();
}

export async function countActiveUsersSql(db: DbExecutor): Promise<number> {
  const row = await db
    .selectFrom('users')
    .select((eb) => eb.fn.countAll().as('total'))
    .where(whereActive)
    .executeTakeFirstOrThrow();

  // pg returns count(*) as a bigint string
  return Number(row.total);
}
