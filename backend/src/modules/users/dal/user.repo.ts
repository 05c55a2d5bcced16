/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users (mutations).
 * - Soft-delete is its own method, separate from field updates, so a field
 *   update can never clear or set the delete flag.
 *
 * RULES:
 * - No transactions started here (service owns tx).
 * - No AppError. Store errors (e.g. unique violation) propagate as-is.
 * - No policies.
 * - Supports withDb() for transaction binding.
 */

import type { Updateable } from 'kysely';

import type { DbExecutor } from '../../../shared/db/db';
import type { Users } from '../../../shared/db/schema';
import { toUser } from '../queries/user.queries';
import type { User, UserFieldUpdate, UserId } from '../user.types';
import { normalizeEmail } from '../helpers/normalize-email';
import { whereActive } from './user.query-sql';

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  withDb(db: DbExecutor): UserRepo {
    return new UserRepo(db);
  }

  /**
   * Creates a new active user. Email is unique at the DB level (all rows),
   * so a concurrent insert of the same email fails with a unique violation.
   */
  async insertUser(params: { name: string; email: string; now: Date }): Promise<User> {
    const row = await this.db
      .insertInto('users')
      .values({
        name: params.name,
        email: normalizeEmail(params.email),
        created_at: params.now,
      })
      .returningAll()
      .executeTakeFirstOrThrow();

    return toUser(row);
  }

  /**
   * Applies `fields` to an ACTIVE user and bumps updated_at.
   * Returns undefined when no active row matched.
   */
  async updateUserFields(
    userId: UserId,
    fields: UserFieldUpdate,
    now: Date,
  ): Promise<User | undefined> {
    const patch: Updateable<Users> = { updated_at: now };
    if (fields.name !== undefined) patch.name = fields.name;
    if (fields.email !== undefined) patch.email = normalizeEmail(fields.email);

    const row = await this.db
      .updateTable('users')
      .set(patch)
      .where('id', '=', userId)
      .where(whereActive)
      .returningAll()
      .executeTakeFirst();

    return row ? toUser(row) : undefined;
  }

  /**
   * Soft-deletes an ACTIVE user.
   * Returns false when nothing matched (absent or already deleted).
   */
  async markDeleted(userId: UserId, now: Date): Promise<boolean> {
    const row = await this.db
      .updateTable('users')
      .set({ is_deleted: true, updated_at: now })
      .where('id', '=', userId)
      .where(whereActive)
      .returning('id')
      .executeTakeFirst();

    return row !== undefined;
  }
}
