/**
 * backend/src/modules/users/policies/user.policy.ts
 *
 * WHY:
 * - Existence + email-availability rules in one place.
 * - Pure logic (no DB / no I/O) => easy to unit test.
 *
 * RULES:
 * - Pure functions only.
 * - Throws module-level UserErrors.
 */

import type { User, UserId } from '../user.types';
import { UserErrors } from '../user.errors';

export function assertUserExists(
  user: User | undefined,
  userId: UserId,
): asserts user is User {
  if (!user) throw UserErrors.userNotFound({ userId });
}

export function assertEmailAvailable(taken: boolean, email: string): void {
  if (taken) throw UserErrors.emailTaken({ email });
}

/**
 * An update only needs the uniqueness check when the email actually changes.
 * Both sides are expected to be normalized already.
 */
export function isEmailChange(current: User, nextEmail: string): boolean {
  return current.email !== nextEmail;
}
