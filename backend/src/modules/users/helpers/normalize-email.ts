/**
 * backend/src/modules/users/helpers/normalize-email.ts
 *
 * Emails are compared and stored lower-cased, so uniqueness is case-insensitive.
 */

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}
