/**
 * backend/src/shared/db/pg-errors.ts
 *
 * WHY:
 * - Services must tell a duplicate-key rejection apart from any other store fault.
 * - The unique index is the final arbiter for racing writes; services remap
 *   this one error and let everything else propagate.
 */

// https://www.postgresql.org/docs/current/errcodes-appendix.html
const UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(err: unknown): boolean {
  if (typeof err !== 'object' || err === null) return false;
  if (!('code' in err)) return false;
  return err.code === UNIQUE_VIOLATION;
}
