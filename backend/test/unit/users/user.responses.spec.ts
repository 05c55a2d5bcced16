import { describe, it, expect } from 'vitest';
import { toUserListResponse, toUserResponse } from '../../../src/modules/users/user.responses';
import type { User } from '../../../src/modules/users/user.types';

const created: User = {
  id: 1,
  name: 'John Doe',
  email: 'john.doe@example.com',
  createdAt: new Date('2024-01-01T12:00:00.000Z'),
  updatedAt: null,
};

describe('toUserResponse', () => {
  it('uses snake_case keys and ISO-8601 timestamps', () => {
    expect(toUserResponse(created)).toEqual({
      id: 1,
      name: 'John Doe',
      email: 'john.doe@example.com',
      created_at: '2024-01-01T12:00:00.000Z',
      updated_at: null,
    });
  });

  it('serializes updated_at once set', () => {
    const updated: User = { ...created, updatedAt: new Date('2024-01-02T08:30:00.000Z') };
    expect(toUserResponse(updated).updated_at).toBe('2024-01-02T08:30:00.000Z');
  });
});

describe('toUserListResponse', () => {
  it('keeps paging metadata next to the serialized users', () => {
    expect(toUserListResponse({ users: [created], total: 15, limit: 5, offset: 10 })).toEqual({
      users: [
        {
          id: 1,
          name: 'John Doe',
          email: 'john.doe@example.com',
          created_at: '2024-01-01T12:00:00.000Z',
          updated_at: null,
        },
      ],
      total: 15,
      limit: 5,
      offset: 10,
    });
  });
});
