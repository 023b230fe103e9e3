import { describe, it, expect, vi, beforeEach } from 'vitest';

// ---- Mocks (MUST match import specifiers used by the SUT) ----
const { query } = vi.hoisted(() => ({ query: vi.fn() }));

vi.mock('../../src/db/pool.js', () => ({ pg: { query } }));

// ---- Import SUT after mocks ----
import {
  deleteCoin,
  findCoinBySymbol,
  getCoin,
  getCoinPrice,
  listCoins,
  listTrending,
  upsertCoin,
  upsertCoinPrice,
  upsertOhlc,
  upsertTrendingCoin,
  type OhlcInput,
} from '../../src/repositories/coins.repo.js';
import { SQL } from '../../src/db/sql.js';
import { DDL } from '../../src/db/schema.js';

function candle(ts: number, close: number): OhlcInput {
  return {
    coinId: 'bitcoin',
    vsCurrency: 'usd',
    interval: 7,
    ts,
    open: close - 10,
    high: close + 5,
    low: close - 20,
    close,
    volume: null,
    marketCap: null,
  };
}

describe('coins.repo', () => {
  beforeEach(() => {
    query.mockReset();
  });

  it('upsertCoin serialises json columns', async () => {
    query.mockResolvedValueOnce({ rows: [{ id: 'bitcoin' }] });

    await upsertCoin({ id: 'bitcoin', symbol: 'btc', name: 'Bitcoin', platforms: { ethereum: '0xabc' } });

    expect(query).toHaveBeenCalledWith(SQL.coins.upsert, ['bitcoin', 'btc', 'Bitcoin', '{"ethereum":"0xabc"}', null]);
  });

  it('findCoinBySymbol trims the query and returns null on no match', async () => {
    query.mockResolvedValueOnce({ rows: [] });

    await expect(findCoinBySymbol('  BTC ')).resolves.toBeNull();
    expect(query).toHaveBeenCalledWith(SQL.coins.bySymbolOrId, ['BTC']);
  });

  it('upsertCoinPrice lowercases the currency', async () => {
    query.mockResolvedValueOnce({ rows: [{ coinId: 'bitcoin', currency: 'usd', price: 1 }] });

    await upsertCoinPrice({ coinId: 'bitcoin', currency: 'USD', price: 1 });

    expect(query).toHaveBeenCalledWith(SQL.prices.upsert, ['bitcoin', 'usd', 1, null, null, null]);
  });

  it('upsertCoinPrice maps an unknown coin to FOREIGN_KEY_VIOLATION', async () => {
    query.mockRejectedValueOnce(Object.assign(new Error('fk'), { code: '23503' }));

    await expect(upsertCoinPrice({ coinId: 'nope', currency: 'usd', price: 1 })).rejects.toMatchObject({
      code: 'FOREIGN_KEY_VIOLATION',
      message: 'coin price references a missing row',
    });
  });

  it('getCoinPrice defaults to usd', async () => {
    query.mockResolvedValueOnce({ rows: [] });

    await getCoinPrice('bitcoin');

    expect(query).toHaveBeenCalledWith(SQL.prices.get, ['bitcoin', 'usd']);
  });

  it('upsertOhlc writes the whole batch in one statement', async () => {
    query.mockResolvedValue({ rows: [], rowCount: 2 });

    const n = await upsertOhlc([candle(1704067200, 42000), candle(1704672000, 43000)]);

    expect(n).toBe(2);
    expect(query).toHaveBeenCalledTimes(1);
    expect(query).toHaveBeenCalledWith(SQL.ohlc.upsertBatch, [
      ['bitcoin', 'bitcoin'],
      ['usd', 'usd'],
      [7, 7],
      [1704067200, 1704672000],
      [41990, 42990],
      [42005, 43005],
      [41980, 42980],
      [42000, 43000],
      [null, null],
      [null, null],
    ]);
  });

  it('upsertOhlc keeps the last candle for a repeated timestamp', async () => {
    query.mockResolvedValue({ rows: [], rowCount: 1 });

    await upsertOhlc([candle(1704067200, 42000), candle(1704067200, 42500)]);

    const params = query.mock.calls[0]?.[1];
    expect(params?.[3]).toEqual([1704067200]);
    expect(params?.[7]).toEqual([42500]);
  });

  it('upsertOhlc leaves nothing half-written when the batch fails', async () => {
    query.mockRejectedValueOnce(Object.assign(new Error('fk'), { code: '23503' }));

    await expect(upsertOhlc([candle(1704067200, 42000), candle(1704672000, 43000)])).rejects.toMatchObject({
      code: 'FOREIGN_KEY_VIOLATION',
      message: 'ohlc references a missing row',
    });
    expect(query).toHaveBeenCalledTimes(1);
  });

  it('upsertOhlc with no candles issues no query', async () => {
    await expect(upsertOhlc([])).resolves.toBe(0);
    expect(query).not.toHaveBeenCalled();
  });

  it('deleteCoin reports whether a row went away', async () => {
    query.mockResolvedValueOnce({ rows: [], rowCount: 1 }).mockResolvedValueOnce({ rows: [], rowCount: 0 });

    await expect(deleteCoin('bitcoin')).resolves.toBe(true);
    await expect(deleteCoin('bitcoin')).resolves.toBe(false);
  });

  it('getCoin returns the row or null', async () => {
    query.mockResolvedValueOnce({ rows: [{ id: 'bitcoin', symbol: 'btc' }] }).mockResolvedValueOnce({ rows: [] });

    await expect(getCoin('bitcoin')).resolves.toEqual({ id: 'bitcoin', symbol: 'btc' });
    await expect(getCoin('nope')).resolves.toBeNull();
    expect(query).toHaveBeenNthCalledWith(1, SQL.coins.byId, ['bitcoin']);
  });

  it('listCoins pages by 100 by default', async () => {
    query.mockResolvedValue({ rows: [] });

    await listCoins();
    await listCoins(5);

    expect(query).toHaveBeenNthCalledWith(1, SQL.coins.list, [100]);
    expect(query).toHaveBeenNthCalledWith(2, SQL.coins.list, [5]);
  });

  it('upsertTrendingCoin keeps one row per coin', async () => {
    query.mockResolvedValue({ rows: [], rowCount: 1 });

    await upsertTrendingCoin({ coinId: 'bitcoin', rank: 2, score: 0.8, marketCap: null, thumb: null });

    expect(query).toHaveBeenCalledWith(SQL.trending.upsert, ['bitcoin', 2, 0.8, null, null]);
    expect(SQL.trending.upsert).toContain('ON CONFLICT ON CONSTRAINT unique_trending_coin DO UPDATE');
    const table = DDL.find((stmt) => stmt.includes('CREATE TABLE IF NOT EXISTS trending_coins'));
    expect(table).toContain('CONSTRAINT unique_trending_coin UNIQUE (coin_id)');
  });

  it('listTrending returns the top 10 by default', async () => {
    query.mockResolvedValueOnce({ rows: [{ coinId: 'bitcoin', rank: 1 }] });

    await expect(listTrending()).resolves.toEqual([{ coinId: 'bitcoin', rank: 1 }]);
    expect(query).toHaveBeenCalledWith(SQL.trending.list, [10]);
  });
});
