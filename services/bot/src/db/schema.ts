// services/bot/src/db/schema.ts
import { pg, withTx } from './pool.js';
import { AppError, translatePgError } from '../errors.js';
import { logger } from '../logger.js';

// Order matters: parents before children.
export const DDL: readonly string[] = [
  `
  CREATE TABLE IF NOT EXISTS coins (
    id            TEXT PRIMARY KEY,
    symbol        TEXT NOT NULL,
    name          TEXT NOT NULL,
    platforms     JSONB,
    extra_data    JSONB,
    last_updated  TIMESTAMPTZ NOT NULL DEFAULT now()
  )`,
  `CREATE INDEX IF NOT EXISTS coins_symbol_idx ON coins (lower(symbol))`,
  `
  CREATE TABLE IF NOT EXISTS coin_prices (
    id                SERIAL PRIMARY KEY,
    coin_id           TEXT NOT NULL REFERENCES coins(id) ON DELETE CASCADE,
    currency          TEXT NOT NULL,
    price             DOUBLE PRECISION,
    market_cap        DOUBLE PRECISION,
    volume_24h        DOUBLE PRECISION,
    price_change_24h  DOUBLE PRECISION,
    last_updated      TIMESTAMPTZ NOT NULL DEFAULT now(),
    CONSTRAINT unique_coin_currency UNIQUE (coin_id, currency)
  )`,
  `
  CREATE TABLE IF NOT EXISTS ohlc (
    id            SERIAL PRIMARY KEY,
    coin_id       TEXT NOT NULL REFERENCES coins(id) ON DELETE CASCADE,
    vs_currency   TEXT NOT NULL,
    interval_days SMALLINT NOT NULL CHECK (interval_days IN (1, 7, 30, 90)),
    ts            TIMESTAMPTZ NOT NULL,
    open          DOUBLE PRECISION,
    high          DOUBLE PRECISION,
    low           DOUBLE PRECISION,
    close         DOUBLE PRECISION,
    volume        DOUBLE PRECISION,
    market_cap    DOUBLE PRECISION,
    last_updated  TIMESTAMPTZ NOT NULL DEFAULT now(),
    CONSTRAINT unique_coin_timestamp UNIQUE (coin_id, ts)
  )`,
  `
  CREATE TABLE IF NOT EXISTS trending_coins (
    id            SERIAL PRIMARY KEY,
    coin_id       TEXT NOT NULL REFERENCES coins(id) ON DELETE CASCADE,
    rank          INTEGER NOT NULL,
    score         DOUBLE PRECISION,
    market_cap    DOUBLE PRECISION,
    thumb         TEXT,
    last_updated  TIMESTAMPTZ NOT NULL DEFAULT now(),
    CONSTRAINT unique_trending_coin UNIQUE (coin_id)
  )`,
  `
  CREATE TABLE IF NOT EXISTS users (
    id                    SERIAL PRIMARY KEY,
    telegram_id           TEXT NOT NULL UNIQUE,
    username              TEXT,
    user_type             TEXT NOT NULL DEFAULT 'guest' CHECK (user_type IN ('guest', 'premium', 'banned')),
    created_at            TIMESTAMPTZ NOT NULL DEFAULT now(),
    last_active           TIMESTAMPTZ NOT NULL DEFAULT now(),
    language              TEXT NOT NULL DEFAULT 'en',
    preferred_chart_type  TEXT NOT NULL DEFAULT 'price',
    preferred_timeframe   INTEGER NOT NULL DEFAULT 30
  )`,
  `
  CREATE TABLE IF NOT EXISTS user_activities (
    id             SERIAL PRIMARY KEY,
    user_id        TEXT NOT NULL REFERENCES users(telegram_id) ON DELETE CASCADE,
    coin_id        TEXT NOT NULL REFERENCES coins(id) ON DELETE CASCADE,
    activity_type  TEXT NOT NULL,
    ts             BIGINT NOT NULL,
    details        JSONB
  )`,
  `CREATE INDEX IF NOT EXISTS user_activities_user_ts_idx ON user_activities (user_id, ts DESC)`,
  `
  CREATE TABLE IF NOT EXISTS admins (
    id          SERIAL PRIMARY KEY,
    user_id     TEXT NOT NULL UNIQUE REFERENCES users(telegram_id) ON DELETE CASCADE,
    role        TEXT NOT NULL DEFAULT 'normal' CHECK (role IN ('master', 'normal', 'watcher')),
    created_at  TIMESTAMPTZ NOT NULL DEFAULT now(),
    created_by  TEXT,
    is_active   BOOLEAN NOT NULL DEFAULT TRUE
  )`,
  `
  CREATE TABLE IF NOT EXISTS admin_activities (
    id              SERIAL PRIMARY KEY,
    admin_id        TEXT NOT NULL REFERENCES admins(user_id) ON DELETE CASCADE,
    activity_type   TEXT NOT NULL,
    target_user_id  TEXT REFERENCES users(telegram_id),
    ts              TIMESTAMPTZ NOT NULL DEFAULT now(),
    details         JSONB
  )`,
];

/**
 * Creates every table that is missing. Safe to run on each boot. Any failure
 * (unreachable server, bad DDL, missing privileges) comes back as
 * STORE_UNAVAILABLE; the caller decides that this is fatal.
 */
export async function initDb(): Promise<void> {
  try {
    await withTx(async (tx) => {
      for (const stmt of DDL) await tx.query(stmt);
    });
  } catch (err) {
    const mapped = translatePgError(err, 'schema');
    if (mapped instanceof AppError && mapped.code === 'STORE_UNAVAILABLE') throw mapped;
    throw new AppError('STORE_UNAVAILABLE', 'schema initialisation failed', { cause: err });
  }
  logger.info({ tables: 8 }, 'schema ready');
}

export async function closeDb() {
  await pg.end();
}
