/**
 * backend/src/modules/users/user.service.ts
 *
 * WHY:
 * - Orchestrates user CRUD: business rules -> DAL -> domain result.
 * - Only place allowed to start transactions.
 *
 * RULES:
 * - No raw DB access outside queries/DAL.
 * - Absence -> UserErrors.userNotFound; email collision -> UserErrors.emailTaken.
 * - The isEmailTaken pre-check only gives a friendly error. The unique index
 *   decides races, so a unique violation from the store is remapped here too.
 * - Any other store fault propagates untouched (error handler -> 500).
 */

import type { DbExecutor } from '../../shared/db/db';
import type { Logger } from '../../shared/logger/logger';
import { isUniqueViolation } from '../../shared/db/pg-errors';

import type { UserRepo } from './dal/user.repo';
import {
  getActiveUserByEmail,
  getActiveUserById,
  isEmailTaken,
  listActiveUsers,
} from './queries/user.queries';
import { assertEmailAvailable, assertUserExists, isEmailChange } from './policies/user.policy';
import { USER_DELETED_MESSAGE, UserErrors } from './user.errors';
import { normalizeEmail } from './helpers/normalize-email';
import type {
  CreateUserInput,
  Pagination,
  UpdateUserInput,
  User,
  UserId,
  UserPage,
} from './user.types';

export class UserService {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      logger: Logger;
      userRepo: UserRepo;
    },
  ) {}

  async createUser(input: CreateUserInput): Promise<User> {
    const email = normalizeEmail(input.email);

    const taken = await isEmailTaken(this.deps.db, email);
    if (taken) {
      this.deps.logger.warn('users.create.conflict', {
        flow: 'users.create',
        reason: 'email_taken',
      });
    }
    assertEmailAvailable(taken, email);

    try {
      const user = await this.deps.userRepo.insertUser({
        name: input.name,
        email,
        now: new Date(),
      });

      this.deps.logger.info('users.create.success', { flow: 'users.create', userId: user.id });

      return user;
    } catch (err) {
      if (isUniqueViolation(err)) {
        this.deps.logger.warn('users.create.conflict', {
          flow: 'users.create',
          reason: 'unique_violation',
        });
        throw UserErrors.emailTaken({ email });
      }
      throw err;
    }
  }

  async getUser(userId: UserId): Promise<User> {
    const user = await getActiveUserById(this.deps.db, userId);
    assertUserExists(user, userId);
    return user;
  }

  getUserByEmail(email: string): Promise<User | undefined> {
    return getActiveUserByEmail(this.deps.db, email);
  }

  listUsers(page: Pagination): Promise<UserPage> {
    return listActiveUsers(this.deps.db, page);
  }

  async updateUser(userId: UserId, input: UpdateUserInput): Promise<User> {
    const email = normalizeEmail(input.email);

    try {
      const user = await this.deps.db.transaction().execute(async (trx) => {
        const userRepo = this.deps.userRepo.withDb(trx);

        // 1) Target must be an active user
        const existing = await getActiveUserById(trx, userId);
        assertUserExists(existing, userId);

        // 2) Changing email? It must not belong to another active user
        if (isEmailChange(existing, email)) {
          const taken = await isEmailTaken(trx, email, { excludeUserId: userId });
          if (taken) {
            this.deps.logger.warn('users.update.conflict', {
              flow: 'users.update',
              userId,
              reason: 'email_taken',
            });
          }
          assertEmailAvailable(taken, email);
        }

        // 3) Write both fields (deleted between read and write => not found)
        const updated = await userRepo.updateUserFields(
          userId,
          { name: input.name, email },
          new Date(),
        );
        assertUserExists(updated, userId);

        return updated;
      });

      this.deps.logger.info('users.update.success', { flow: 'users.update', userId });

      return user;
    } catch (err) {
      if (isUniqueViolation(err)) {
        this.deps.logger.warn('users.update.conflict', {
          flow: 'users.update',
          userId,
          reason: 'unique_violation',
        });
        throw UserErrors.emailTaken({ email, userId });
      }
      throw err;
    }
  }

  async deleteUser(userId: UserId): Promise<string> {
    const deleted = await this.deps.userRepo.markDeleted(userId, new Date());
    if (!deleted) {
      throw UserErrors.userNotFound({ userId });
    }

    this.deps.logger.info('users.delete.success', { flow: 'users.delete', userId });

    return USER_DELETED_MESSAGE;
  }
}
