import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { createMemDb } from '../../helpers/mem-db';
import type { Db } from '../../../src/shared/db/db';
import { logger } from '../../../src/shared/logger/logger';
import { UserRepo } from '../../../src/modules/users/dal/user.repo';
import { UserService } from '../../../src/modules/users/user.service';

const john = { name: 'John Doe', email: 'john.doe@example.com' };
const jane = { name: 'Jane Roe', email: 'jane.roe@example.com' };

describe('UserService', () => {
  let db: Db;
  let service: UserService;

  beforeEach(async () => {
    db = await createMemDb();
    service = new UserService({ db, logger, userRepo: new UserRepo(db) });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await db.destroy();
  });

  describe('createUser', () => {
    it('creates an active user with created_at set and no updated_at', async () => {
      const user = await service.createUser(john);

      expect(user.id).toBe(1);
      expect(user.name).toBe('John Doe');
      expect(user.email).toBe('john.doe@example.com');
      expect(user.createdAt).toBeInstanceOf(Date);
      expect(user.updatedAt).toBeNull();
    });

    it('rejects an email held by an active user with CONFLICT', async () => {
      await service.createUser(john);

      await expect(
        service.createUser({ name: 'Other John', email: 'JOHN.DOE@example.com' }),
      ).rejects.toMatchObject({ status: 409, code: 'CONFLICT', message: 'Email already exists' });
    });

    it('logs users.create.conflict when an active user already holds the email', async () => {
      await service.createUser(john);
      const warn = vi.spyOn(logger, 'warn');

      await expect(service.createUser(john)).rejects.toMatchObject({ status: 409 });

      expect(warn).toHaveBeenCalledWith('users.create.conflict', {
        flow: 'users.create',
        reason: 'email_taken',
      });
    });

    it('yields exactly one success and one CONFLICT for concurrent creates', async () => {
      const results = await Promise.allSettled([
        service.createUser(john),
        service.createUser({ name: 'John Twin', email: john.email }),
      ]);

      const fulfilled = results.filter((r) => r.status === 'fulfilled');
      const rejected = results.filter(
        (r): r is PromiseRejectedResult => r.status === 'rejected',
      );

      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(1);
      expect(rejected[0]?.reason).toMatchObject({ status: 409, code: 'CONFLICT' });
    });

    it('maps the store unique violation to CONFLICT when a deleted user holds the email', async () => {
      const first = await service.createUser(john);
      await service.deleteUser(first.id);

      // pre-check passes (no active holder); the unique index still rejects
      await expect(service.createUser(john)).rejects.toMatchObject({
        status: 409,
        code: 'CONFLICT',
      });
    });
  });

  describe('getUser / getUserByEmail', () => {
    it('returns an active user', async () => {
      const created = await service.createUser(john);

      expect(await service.getUser(created.id)).toEqual(created);
      expect(await service.getUserByEmail('John.Doe@Example.com')).toEqual(created);
    });

    it('fails with NOT_FOUND for ids never created', async () => {
      await expect(service.getUser(42)).rejects.toMatchObject({
        status: 404,
        code: 'NOT_FOUND',
        message: 'User is not found',
      });
    });

    it('returns undefined for an unknown email', async () => {
      expect(await service.getUserByEmail('nobody@example.com')).toBeUndefined();
    });
  });

  describe('listUsers', () => {
    it('never returns more than limit items and reports the full total', async () => {
      await service.createUser(john);
      await service.createUser(jane);
      await service.createUser({ name: 'Max Mustermann', email: 'max@example.com' });

      const page = await service.listUsers({ limit: 2, offset: 0 });

      expect(page.users).toHaveLength(2);
      expect(page.total).toBe(3);
      expect(page.limit).toBe(2);
      expect(page.offset).toBe(0);
    });
  });

  describe('updateUser', () => {
    it('updates the name with the same email without a conflict', async () => {
      const created = await service.createUser(john);

      const updated = await service.updateUser(created.id, { name: 'Johnny', email: john.email });

      expect(updated.name).toBe('Johnny');
      expect(updated.email).toBe('john.doe@example.com');
      expect(updated.createdAt).toEqual(created.createdAt);
      expect(updated.updatedAt).toBeInstanceOf(Date);
      expect(updated.updatedAt!.getTime()).toBeGreaterThanOrEqual(created.createdAt.getTime());
    });

    it('changes the email when it is free', async () => {
      const created = await service.createUser(john);

      const updated = await service.updateUser(created.id, {
        name: 'John Doe',
        email: 'John@Example.com',
      });

      expect(updated.email).toBe('john@example.com');
      expect(await service.getUserByEmail('john.doe@example.com')).toBeUndefined();
    });

    it('rejects an email held by another active user with CONFLICT', async () => {
      const created = await service.createUser(john);
      await service.createUser(jane);

      await expect(
        service.updateUser(created.id, { name: 'John Doe', email: jane.email }),
      ).rejects.toMatchObject({ status: 409, code: 'CONFLICT' });

      expect((await service.getUser(created.id)).email).toBe('john.doe@example.com');
    });

    it('logs users.update.conflict when another active user holds the email', async () => {
      const created = await service.createUser(john);
      await service.createUser(jane);
      const warn = vi.spyOn(logger, 'warn');

      await expect(
        service.updateUser(created.id, { name: 'John Doe', email: jane.email }),
      ).rejects.toMatchObject({ status: 409 });

      expect(warn).toHaveBeenCalledWith('users.update.conflict', {
        flow: 'users.update',
        userId: created.id,
        reason: 'email_taken',
      });
    });

    it('maps the store unique violation to CONFLICT when a deleted user holds the email', async () => {
      const created = await service.createUser(john);
      const gone = await service.createUser(jane);
      await service.deleteUser(gone.id);

      await expect(
        service.updateUser(created.id, { name: 'John Doe', email: jane.email }),
      ).rejects.toMatchObject({ status: 409, code: 'CONFLICT' });
    });

    it('fails with NOT_FOUND for an unknown id', async () => {
      await expect(service.updateUser(42, john)).rejects.toMatchObject({ status: 404 });
    });
  });

  describe('deleteUser', () => {
    it('soft-deletes, after which get/update/delete all fail with NOT_FOUND', async () => {
      const created = await service.createUser(john);
      await service.createUser(jane);

      expect(await service.deleteUser(created.id)).toBe('Deleted user successfully');

      await expect(service.getUser(created.id)).rejects.toMatchObject({ status: 404 });
      await expect(service.updateUser(created.id, john)).rejects.toMatchObject({ status: 404 });
      await expect(service.deleteUser(created.id)).rejects.toMatchObject({ status: 404 });

      const page = await service.listUsers({ limit: 10, offset: 0 });
      expect(page.total).toBe(1);
      expect(page.users.map((u) => u.email)).toEqual(['jane.roe@example.com']);
    });

    it('keeps the row in the table with the delete flag set', async () => {
      const created = await service.createUser(john);
      await service.deleteUser(created.id);

      const raw = await db
        .selectFrom('users')
        .select(['is_deleted', 'updated_at'])
        .where('id', '=', created.id)
        .executeTakeFirstOrThrow();

      expect(raw.is_deleted).toBe(true);
      expect(raw.updated_at).toBeInstanceOf(Date);
    });
  });
});
