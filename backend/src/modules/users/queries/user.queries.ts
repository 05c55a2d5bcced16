/**
 * backend/src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into User domain types.
 *
 * RULES:
 * - Read-only.
 * - No AppError (absence is `undefined`; the service decides what it means).
 */

import type { DbExecutor } from '../../../shared/db/db';
import {
  countActiveUsersSql,
  selectActiveUserByEmailSql,
  selectActiveUserByIdSql,
  selectActiveUserIdByEmailSql,
  selectActiveUsersPageSql,
} from '../dal/user.query-sql';
import type { UserRow } from '../dal/user.query-sql';
import type { Pagination, User, UserId, UserPage } from '../user.types';

export function toUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    createdAt: row.created_at,
    updatedAt: row.updated_at ?? null,
  };
}

export async function getActiveUserById(db: DbExecutor, userId: UserId): Promise<User | undefined> {
  const row = await selectActiveUserByIdSql(db, userId);
  if (!row) return undefined;
  return toUser(row);
}

export async function getActiveUserByEmail(
  db: DbExecutor,
  email: string,
): Promise<User | undefined> {
  const row = await selectActiveUserByEmailSql(db, email);
  if (!row) return undefined;
  return toUser(row);
}

export async function isEmailTaken(
  db: DbExecutor,
  email: string,
  opts: { excludeUserId?: UserId } = {},
): Promise<boolean> {
  const row = await selectActiveUserIdByEmailSql(db, {
    email,
    excludeUserId: opts.excludeUserId,
  });
  return row !== undefined;
}

/**
 * One count + one page fetch. `total` ignores limit/offset.
 */
export async function listActiveUsers(db: DbExecutor, page: Pagination): Promise<UserPage> {
  const total = await countActiveUsersSql(db);
  const rows = await selectActiveUsersPageSql(db, page);

  return {
    users: rows.map(toUser),
    total,
    limit: page.limit,
    offset: page.offset,
  };
}
