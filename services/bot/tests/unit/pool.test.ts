import { describe, it, expect, vi, beforeEach } from 'vitest';

// ---- Mocks (MUST match import specifiers used by the SUT) ----
const { client, connect } = vi.hoisted(() => {
  const client = { query: vi.fn(), release: vi.fn() };
  return { client, connect: vi.fn(async () => client) };
});

vi.mock('pg', async () => {
  const { EventEmitter } = await import('node:events');
  class Pool extends EventEmitter {
    connect = connect;
    query = vi.fn();
    end = vi.fn();
  }
  return { Pool, default: { Pool } };
});

// ---- Import SUT after mocks ----
import { pg, withTx } from '../../src/db/pool.js';
import { logger } from '../../src/logger.js';

function statements() {
  return client.query.mock.calls.map((c) => c[0]);
}

describe('db/pool', () => {
  beforeEach(() => {
    client.query.mockReset();
    client.release.mockReset();
    connect.mockClear();
  });

  it('logs an idle client error instead of letting it escape', () => {
    const spy = vi.spyOn(logger, 'error');
    const err = Object.assign(new Error('terminating connection due to administrator command'), { code: '57P01' });

    expect(pg.listenerCount('error')).toBe(1);
    expect(() => pg.emit('error', err)).not.toThrow();
    expect(spy).toHaveBeenCalledWith({ err }, 'pg idle client error');
    spy.mockRestore();
  });

  it('withTx commits and releases the client', async () => {
    client.query.mockResolvedValue({ rows: [] });

    const out = await withTx(async (tx) => {
      await tx.query('SELECT 1');
      return 'done';
    });

    expect(out).toBe('done');
    expect(statements()).toEqual(['BEGIN', 'SELECT 1', 'COMMIT']);
    expect(client.release).toHaveBeenCalledTimes(1);
    expect(client.release.mock.calls[0]?.[0]).toBeUndefined();
  });

  it('withTx rolls back, rethrows and returns the client to the pool', async () => {
    client.query.mockResolvedValue({ rows: [] });
    const boom = new Error('insert failed');

    await expect(
      withTx(async (tx) => {
        await tx.query('INSERT 1');
        throw boom;
      }),
    ).rejects.toBe(boom);

    expect(statements()).toEqual(['BEGIN', 'INSERT 1', 'ROLLBACK']);
    expect(client.release).toHaveBeenCalledTimes(1);
    expect(client.release.mock.calls[0]?.[0]).toBeUndefined();
  });

  it('withTx destroys the client when ROLLBACK fails too', async () => {
    const lost = new Error('connection lost');
    client.query.mockImplementation(async (sql: string) => {
      if (sql === 'ROLLBACK') throw lost;
      if (sql === 'INSERT 1') throw new Error('insert failed');
      return { rows: [] };
    });

    await expect(withTx((tx) => tx.query('INSERT 1'))).rejects.toThrow('insert failed');

    expect(client.release).toHaveBeenCalledWith(lost);
  });
});
