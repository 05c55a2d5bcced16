/**
 * backend/src/modules/users/user.responses.ts
 *
 * WHY:
 * - One committed JSON shape per response; no reflection over objects.
 * - Public field names are snake_case (API contract), domain stays camelCase.
 */

import type { User, UserPage } from './user.types';

export type UserResponse = {
  id: number;
  name: string;
  email: string;
  created_at: string;
  updated_at: string | null;
};

export type UserListResponse = {
  users: UserResponse[];
  total: number;
  limit: number;
  offset: number;
};

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
    created_at: user.createdAt.toISOString(),
    updated_at: user.updatedAt ? user.updatedAt.toISOString() : null,
  };
}

export function toUserListResponse(page: UserPage): UserListResponse {
  return {
    users: page.users.map(toUserResponse),
    total: page.total,
    limit: page.limit,
    offset: page.offset,
  };
}
