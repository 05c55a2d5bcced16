import { describe, it, expect } from 'vitest';
import { acknowledged, created, failure, success } from '../../../../src/shared/http/envelope';

describe('response envelope', () => {
  it('wraps payloads as success with a default message', () => {
    expect(success({ total: 0 })).toEqual({
      status: 'success',
      message: 'Success',
      data: { total: 0 },
    });
  });

  it('uses "Created" for created payloads', () => {
    expect(created({ id: 1 })).toEqual({ status: 'success', message: 'Created', data: { id: 1 } });
  });

  it('acknowledges with a message and no data', () => {
    expect(acknowledged('Deleted user successfully')).toEqual({
      status: 'success',
      message: 'Deleted user successfully',
      data: null,
    });
  });

  it('marks 4xx as fail and 5xx as error', () => {
    expect(failure(404, 'User is not found')).toEqual({
      status: 'fail',
      message: 'User is not found',
      data: null,
    });
    expect(failure(500, 'Internal server error')).toEqual({
      status: 'error',
      message: 'Internal server error',
      data: null,
    });
  });

  it('carries validation issues as data, but only when there are some', () => {
    const issues = [{ path: 'name', message: 'name must not be empty' }];

    expect(failure(422, 'Invalid request body', issues).data).toEqual(issues);
    expect(failure(422, 'Invalid request body', []).data).toBeNull();
  });
});
