/**
 * backend/src/modules/users/user.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Users module.
 * - Prevents invalid payloads from reaching services (422 at the boundary).
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Emails are trimmed + lower-cased here; the DAL normalizes again for
 *   callers that bypass HTTP.
 */

import { z } from 'zod';

// Postgres `serial` upper bound.
const MAX_USER_ID = 2_147_483_647;

// Path and query values arrive as strings. Only plain decimal digits are
// numbers here; `Number()` alone would also take '0x10', '1e1' and ' 1'.
const digitsSchema = z.string().regex(/^\d+$/, 'must be a non-negative integer');

const nameSchema = z
  .string({ required_error: 'name is required' })
  .trim()
  .min(1, 'name must not be empty')
  .max(100, 'name must be at most 100 characters');

const emailSchema = z
  .string({ required_error: 'email is required' })
  .trim()
  .toLowerCase()
  .max(255, 'email must be at most 255 characters')
  .email('email must be a valid email address');

export const createUserSchema = z.object({
  name: nameSchema,
  email: emailSchema,
});

// PUT replaces both fields.
export const updateUserSchema = createUserSchema;

export const userIdParamsSchema = z.object({
  id: digitsSchema.pipe(z.coerce.number().int().min(1).max(MAX_USER_ID)),
});

export const listUsersQuerySchema = z.object({
  limit: digitsSchema.default('10').pipe(z.coerce.number().int().min(1).max(100)),
  // Echoed back in the response, so it must survive the trip through a JS number.
  offset: digitsSchema
    .default('0')
    .pipe(z.coerce.number().int().min(0).max(Number.MAX_SAFE_INTEGER)),
});

export type CreateUserBody = z.infer<typeof createUserSchema>;
export type UpdateUserBody = z.infer<typeof updateUserSchema>;
export type UserIdParams = z.infer<typeof userIdParamsSchema>;
export type ListUsersQuery = z.infer<typeof listUsersQuerySchema>;
