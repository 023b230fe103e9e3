// services/bot/src/db/sql.ts
// Column lists alias snake_case to the camelCase domain shapes.
const USER_COLS = `
  telegram_id          AS "telegramId",
  username,
  user_type            AS "userType",
  created_at           AS "createdAt",
  last_active          AS "lastActive",
  language,
  preferred_chart_type AS "preferredChartType",
  preferred_timeframe  AS "preferredTimeframe"
`;

const ADMIN_COLS = `
  user_id    AS "userId",
  role,
  created_at AS "createdAt",
  created_by AS "createdBy",
  is_active  AS "isActive"
`;

const COIN_COLS = `
  id, symbol, name, platforms,
  extra_data   AS "extraData",
  last_updated AS "lastUpdated"
`;

const PRICE_COLS = `
  coin_id          AS "coinId",
  currency,
  price,
  market_cap       AS "marketCap",
  volume_24h       AS "volume24h",
  price_change_24h AS "priceChange24h",
  last_updated     AS "lastUpdated"
`;

const OHLC_COLS = `
  coin_id       AS "coinId",
  vs_currency   AS "vsCurrency",
  interval_days AS "interval",
  ts, open, high, low, close, volume,
  market_cap    AS "marketCap"
`;

const TRENDING_COLS = `
  coin_id      AS "coinId",
  rank, score,
  market_cap   AS "marketCap",
  thumb,
  last_updated AS "lastUpdated"
`;

export const SQL = {
  users: {
    byTelegramId: `
      SELECT ${USER_COLS}
      FROM users
      WHERE telegram_id = $1
    `,
    insert: `
      INSERT INTO users (telegram_id, username, user_type, language, preferred_chart_type, preferred_timeframe)
      VALUES ($1, $2, COALESCE($3, 'guest'), COALESCE($4, 'en'), COALESCE($5, 'price'), COALESCE($6, 30))
      RETURNING ${USER_COLS}
    `,
    updateLanguage: `
      UPDATE users SET language = $2, last_active = now()
      WHERE telegram_id = $1
      RETURNING ${USER_COLS}
    `,
    updateType: `
      UPDATE users SET user_type = $2
      WHERE telegram_id = $1
      RETURNING ${USER_COLS}
    `,
    updatePreferences: `
      UPDATE users
         SET preferred_chart_type = COALESCE($2, preferred_chart_type),
             preferred_timeframe  = COALESCE($3, preferred_timeframe),
             last_active          = now()
      WHERE telegram_id = $1
      RETURNING ${USER_COLS}
    `,
    touch: `
      UPDATE users SET last_active = now()
      WHERE telegram_id = $1
    `,
  },
  userActivities: {
    insert: `
      INSERT INTO user_activities (user_id, coin_id, activity_type, ts, details)
      VALUES ($1, $2, $3, $4, $5::jsonb)
    `,
    listByUser: `
      SELECT
        user_id            AS "userId",
        coin_id            AS "coinId",
        activity_type      AS "activityType",
        ts::float8         AS ts,
        details
      FROM user_activities
      WHERE user_id = $1
      ORDER BY ts DESC, id DESC
      LIMIT $2
    `,
  },
  admins: {
    byUserId: `
      SELECT ${ADMIN_COLS}
      FROM admins
      WHERE user_id = $1
    `,
    lockByUserId: `
      SELECT ${ADMIN_COLS}
      FROM admins
      WHERE user_id = $1
      FOR UPDATE
    `,
    insert: `
      INSERT INTO admins (user_id, role, created_by)
      VALUES ($1, $2, $3)
      RETURNING ${ADMIN_COLS}
    `,
    updateRole: `
      UPDATE admins SET role = $2
      WHERE user_id = $1
      RETURNING ${ADMIN_COLS}
    `,
    setActive: `
      UPDATE admins SET is_active = $2
      WHERE user_id = $1
      RETURNING ${ADMIN_COLS}
    `,
    list: `
      SELECT ${ADMIN_COLS}
      FROM admins
      ORDER BY created_at ASC, id ASC
    `,
  },
  adminActivities: {
    insert: `
      INSERT INTO admin_activities (admin_id, activity_type, target_user_id, details)
      VALUES ($1, $2, $3, $4::jsonb)
    `,
    listByAdmin: `
      SELECT
        admin_id        AS "adminId",
        activity_type   AS "activityType",
        target_user_id  AS "targetUserId",
        ts,
        details
      FROM admin_activities
      WHERE admin_id = $1
      ORDER BY ts DESC, id DESC
      LIMIT $2
    `,
  },
  coins: {
    upsert: `
      INSERT INTO coins (id, symbol, name, platforms, extra_data)
      VALUES ($1, $2, $3, $4::jsonb, $5::jsonb)
      ON CONFLICT (id) DO UPDATE
        SET symbol       = EXCLUDED.symbol,
            name         = EXCLUDED.name,
            platforms    = EXCLUDED.platforms,
            extra_data   = EXCLUDED.extra_data,
            last_updated = now()
      RETURNING ${COIN_COLS}
    `,
    byId: `
      SELECT ${COIN_COLS}
      FROM coins
      WHERE id = $1
    `,
    // an exact id wins over a symbol match; several coins may share a symbol
    bySymbolOrId: `
      SELECT ${COIN_COLS}
      FROM coins
      WHERE id = lower($1) OR lower(symbol) = lower($1)
      ORDER BY (id = lower($1)) DESC, id ASC
      LIMIT 1
    `,
    list: `
      SELECT ${COIN_COLS}
      FROM coins
      ORDER BY id ASC
      LIMIT $1
    `,
    delete: `DELETE FROM coins WHERE id = $1`,
  },
  prices: {
    upsert: `
      INSERT INTO coin_prices (coin_id, currency, price, market_cap, volume_24h, price_change_24h)
      VALUES ($1, $2, $3, $4, $5, $6)
      ON CONFLICT ON CONSTRAINT unique_coin_currency DO UPDATE
        SET price            = EXCLUDED.price,
            market_cap       = EXCLUDED.market_cap,
            volume_24h       = EXCLUDED.volume_24h,
            price_change_24h = EXCLUDED.price_change_24h,
            last_updated     = now()
      RETURNING ${PRICE_COLS}
    `,
    get: `
      SELECT ${PRICE_COLS}
      FROM coin_prices
      WHERE coin_id = $1 AND currency = $2
    `,
  },
  ohlc: {
    // one statement per batch; rows must be unique on (coin_id, ts)
    upsertBatch: `
      WITH rows AS (
        SELECT
          unnest($1::text[])                          AS coin_id,
          unnest($2::text[])                          AS vs_currency,
          unnest($3::smallint[])                      AS interval_days,
          to_timestamp(unnest($4::double precision[])) AS ts,
          unnest($5::double precision[])              AS open,
          unnest($6::double precision[])              AS high,
          unnest($7::double precision[])              AS low,
          unnest($8::double precision[])              AS close,
          unnest($9::double precision[])              AS volume,
          unnest($10::double precision[])             AS market_cap
      )
      INSERT INTO ohlc (coin_id, vs_currency, interval_days, ts, open, high, low, close, volume, market_cap)
      SELECT coin_id, vs_currency, interval_days, ts, open, high, low, close, volume, market_cap
      FROM rows
      ON CONFLICT ON CONSTRAINT unique_coin_timestamp DO UPDATE
        SET vs_currency   = EXCLUDED.vs_currency,
            interval_days = EXCLUDED.interval_days,
            open          = EXCLUDED.open,
            high          = EXCLUDED.high,
            low           = EXCLUDED.low,
            close         = EXCLUDED.close,
            volume        = EXCLUDED.volume,
            market_cap    = EXCLUDED.market_cap,
            last_updated  = now()
    `,
    list: `
      SELECT ${OHLC_COLS}
      FROM ohlc
      WHERE coin_id = $1 AND interval_days = $2
      ORDER BY ts DESC
      LIMIT $3
    `,
  },
  trending: {
    upsert: `
      INSERT INTO trending_coins (coin_id, rank, score, market_cap, thumb)
      VALUES ($1, $2, $3, $4, $5)
      ON CONFLICT ON CONSTRAINT unique_trending_coin DO UPDATE
        SET rank         = EXCLUDED.rank,
            score        = EXCLUDED.score,
            market_cap   = EXCLUDED.market_cap,
            thumb        = EXCLUDED.thumb,
            last_updated = now()
    `,
    list: `
      SELECT ${TRENDING_COLS}
      FROM trending_coins
      ORDER BY rank ASC
      LIMIT $1
    `,
  },
} as const;
