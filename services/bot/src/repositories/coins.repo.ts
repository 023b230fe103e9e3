import { pg } from '../db/pool.js';
import { SQL } from '../db/sql.js';
import { AppError, withStoreErrors } from '../errors.js';
import { jsonParam } from '../utils/json.js';
import type { Coin, CoinPrice, Json, OhlcCandle, TimeInterval, TrendingCoin } from '../types/domain.js';

export type CoinInput = {
  id: string;
  symbol: string;
  name: string;
  platforms?: Json | null;
  extraData?: Json | null;
};

export type CoinPriceInput = {
  coinId: string;
  currency: string;
  price: number | null;
  marketCap?: number | null;
  volume24h?: number | null;
  priceChange24h?: number | null;
};

// `ts` is epoch seconds
export type OhlcInput = Omit<OhlcCandle, 'ts'> & { ts: number };

export type TrendingInput = Omit<TrendingCoin, 'lastUpdated'>;

export async function upsertCoin(coin: CoinInput): Promise<Coin> {
  return withStoreErrors('coin', async () => {
    const { rows } = await pg.query<Coin>(SQL.coins.upsert, [
      coin.id,
      coin.symbol,
      coin.name,
      jsonParam(coin.platforms),
      jsonParam(coin.extraData),
    ]);
    const row = rows[0];
    if (!row) throw new AppError('NOT_FOUND', `coin ${coin.id} not returned after upsert`);
    return row;
  });
}

export async function getCoin(id: string): Promise<Coin | null> {
  return withStoreErrors('coin', async () => {
    const { rows } = await pg.query<Coin>(SQL.coins.byId, [id]);
    return rows[0] ?? null;
  });
}

/** Accepts either a coin id ("bitcoin") or a ticker ("btc"), case-insensitive. */
export async function findCoinBySymbol(query: string): Promise<Coin | null> {
  return withStoreErrors('coin', async () => {
    const { rows } = await pg.query<Coin>(SQL.coins.bySymbolOrId, [query.trim()]);
    return rows[0] ?? null;
  });
}

export async function listCoins(limit = 100): Promise<Coin[]> {
  return withStoreErrors('coin', async () => {
    const { rows } = await pg.query<Coin>(SQL.coins.list, [limit]);
    return rows;
  });
}

// prices, candles and trending rows go with it (ON DELETE CASCADE)
export async function deleteCoin(id: string): Promise<boolean> {
  return withStoreErrors('coin', async () => {
    const r = await pg.query(SQL.coins.delete, [id]);
    return (r.rowCount ?? 0) > 0;
  });
}

/** Last writer wins on (coin_id, currency). */
export async function upsertCoinPrice(p: CoinPriceInput): Promise<CoinPrice> {
  return withStoreErrors('coin price', async () => {
    const { rows } = await pg.query<CoinPrice>(SQL.prices.upsert, [
      p.coinId,
      p.currency.toLowerCase(),
      p.price,
      p.marketCap ?? null,
      p.volume24h ?? null,
      p.priceChange24h ?? null,
    ]);
    const row = rows[0];
    if (!row) throw new AppError('NOT_FOUND', `price ${p.coinId}/${p.currency} not returned after upsert`);
    return row;
  });
}

export async function getCoinPrice(coinId: string, currency = 'usd'): Promise<CoinPrice | null> {
  return withStoreErrors('coin price', async () => {
    const { rows } = await pg.query<CoinPrice>(SQL.prices.get, [coinId, currency.toLowerCase()]);
    return rows[0] ?? null;
  });
}

/**
 * Writes the batch in one statement, so it lands whole or not at all.
 * A later candle for the same (coin, ts) replaces an earlier one in the batch.
 */
export async function upsertOhlc(candles: OhlcInput[]): Promise<number> {
  if (candles.length === 0) return 0;
  const byTs = new Map<string, OhlcInput>();
  for (const c of candles) byTs.set(`${c.coinId}:${c.ts}`, c);
  const rows = [...byTs.values()];

  return withStoreErrors('ohlc', async () => {
    const r = await pg.query(SQL.ohlc.upsertBatch, [
      rows.map((c) => c.coinId),
      rows.map((c) => c.vsCurrency),
      rows.map((c) => c.interval),
      rows.map((c) => c.ts),
      rows.map((c) => c.open),
      rows.map((c) => c.high),
      rows.map((c) => c.low),
      rows.map((c) => c.close),
      rows.map((c) => c.volume),
      rows.map((c) => c.marketCap),
    ]);
    return r.rowCount ?? 0;
  });
}

// newest first
export async function listOhlc(coinId: string, interval: TimeInterval, limit = 200): Promise<OhlcCandle[]> {
  return withStoreErrors('ohlc', async () => {
    const { rows } = await pg.query<OhlcCandle>(SQL.ohlc.list, [coinId, interval, limit]);
    return rows;
  });
}

export async function upsertTrendingCoin(t: TrendingInput): Promise<void> {
  await withStoreErrors('trending coin', () =>
    pg.query(SQL.trending.upsert, [t.coinId, t.rank, t.score, t.marketCap, t.thumb]),
  );
}

export async function listTrending(limit = 10): Promise<TrendingCoin[]> {
  return withStoreErrors('trending coin', async () => {
    const { rows } = await pg.query<TrendingCoin>(SQL.trending.list, [limit]);
    return rows;
  });
}
