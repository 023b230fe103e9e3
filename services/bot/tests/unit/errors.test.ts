import { describe, it, expect } from 'vitest';
import { AppError, isAppError, translatePgError, withStoreErrors } from '../../src/errors.js';

function pgError(code: string) {
  return Object.assign(new Error('pg failure'), { code });
}

describe('errors', () => {
  it('AppError carries the status of its code', () => {
    const err = new AppError('PERMISSION_DENIED', 'nope');
    expect(err.status).toBe(403);
    expect(err.name).toBe('AppError');
    expect(isAppError(err)).toBe(true);
    expect(isAppError(err, 'NOT_FOUND')).toBe(false);
    expect(isAppError(new Error('plain'))).toBe(false);
  });

  it.each([
    ['23505', 'DUPLICATE_KEY', 'coin already exists'],
    ['23503', 'FOREIGN_KEY_VIOLATION', 'coin references a missing row'],
    ['08006', 'STORE_UNAVAILABLE', 'database unavailable'],
    ['57P01', 'STORE_UNAVAILABLE', 'database unavailable'],
    ['ECONNRESET', 'STORE_UNAVAILABLE', 'database unavailable'],
  ])('translates %s to %s', (code, expected, message) => {
    const cause = pgError(code);
    const out = translatePgError(cause, 'coin');
    expect(out).toBeInstanceOf(AppError);
    expect(out).toMatchObject({ code: expected, message, cause });
  });

  it('returns unrecognised errors untouched', () => {
    const syntax = pgError('42601');
    expect(translatePgError(syntax, 'coin')).toBe(syntax);
    expect(translatePgError('boom', 'coin')).toBe('boom');
  });

  it('withStoreErrors passes AppErrors and results through', async () => {
    const notFound = new AppError('NOT_FOUND', 'gone');
    await expect(withStoreErrors('coin', async () => 7)).resolves.toBe(7);
    await expect(withStoreErrors('coin', () => Promise.reject(notFound))).rejects.toBe(notFound);
    await expect(withStoreErrors('admin', () => Promise.reject(pgError('23505')))).rejects.toMatchObject({
      code: 'DUPLICATE_KEY',
      message: 'admin already exists',
    });
  });
});
