/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - Queries shape DB rows into these types (keeps DB shapes isolated).
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 * - Only ACTIVE users ever leave the DAL, so the delete flag is not part of User.
 */

export type UserId = number;

export type User = {
  id: UserId;
  name: string;
  email: string;

  createdAt: Date;
  updatedAt: Date | null;
};

export type CreateUserInput = {
  name: string;
  email: string;
};

export type UpdateUserInput = {
  name: string;
  email: string;
};

/**
 * Partial field map accepted by UserRepo.updateUserFields.
 * Deliberately has no delete flag: soft-delete is its own write (markDeleted).
 */
export type UserFieldUpdate = {
  name?: string;
  email?: string;
};

export type Pagination = {
  limit: number;
  offset: number;
};

export type UserPage = Pagination & {
  users: User[];
  total: number;
};
