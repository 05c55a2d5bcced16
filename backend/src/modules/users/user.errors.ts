/**
 * backend/src/modules/users/user.errors.ts
 *
 * WHY:
 * - Users module owns its domain semantics.
 * - Prevents shared/http/errors.ts from becoming a giant god-file.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Soft-deleted users are indistinguishable from missing ones (both NOT_FOUND).
 * - Email collisions are always CONFLICT (409), on create and on update.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const UserErrors = {
  userNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('User is not found', meta);
  },

  emailTaken(meta?: AppErrorMeta) {
    return AppError.conflict('Email already exists', meta);
  },
} as const;

export const USER_DELETED_MESSAGE = 'Deleted user successfully';
