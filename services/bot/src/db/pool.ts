import { Pool, type PoolClient } from 'pg';
import { config } from '../config.js';
import { logger } from '../logger.js';

export const pg = new Pool({ connectionString: config.databaseUrl });

// an idle client dropped by the server surfaces here; the pool replaces it on next checkout
pg.on('error', (err) => logger.error({ err }, 'pg idle client error'));

/** Anything that can run a statement: the pool itself or a checked-out tx client. */
export type Queryable = Pick<PoolClient, 'query'>;

export async function dbHealth() {
  const r = await pg.query<{ ok: number }>('SELECT 1 AS ok');
  return r.rows[0]?.ok === 1;
}

export async function withTx<T>(fn: (tx: Queryable) => Promise<T>): Promise<T> {
  const client = await pg.connect();
  // set when ROLLBACK itself fails; the connection is then destroyed instead of reused
  let broken: Error | undefined;
  try {
    await client.query('BEGIN');
    const out = await fn(client);
    await client.query('COMMIT');
    return out;
  } catch (err) {
    await client.query('ROLLBACK').catch((rollbackErr: unknown) => {
      broken = rollbackErr instanceof Error ? rollbackErr : new Error('rollback failed');
      logger.error({ err: rollbackErr }, 'rollback failed');
    });
    throw err;
  } finally {
    client.release(broken);
  }
}
