import { getCoinPrice, listOhlc } from '../repositories/coins.repo.js';
import { ChartType, TimeInterval, isTimeInterval, type Coin, type OhlcCandle, type User } from '../types/domain.js';
import type { AnalysisFeature, AnalysisPort } from '../dispatch/types.js';

export function formatUsd(n: number | null): string {
  if (n === null || !Number.isFinite(n)) return 'n/a';
  return `$${n.toFixed(Math.abs(n) < 1 ? 6 : 2)}`;
}

function formatPct(n: number | null): string {
  if (n === null || !Number.isFinite(n)) return 'n/a';
  return `${n >= 0 ? '+' : ''}${n.toFixed(2)}%`;
}

export function summarizeCandles(candles: OhlcCandle[]) {
  let high: number | null = null;
  let low: number | null = null;
  for (const c of candles) {
    if (c.high !== null && (high === null || c.high > high)) high = c.high;
    if (c.low !== null && (low === null || c.low < low)) low = c.low;
  }
  // candles arrive newest first
  const lastClose = candles[0]?.close ?? null;
  return { count: candles.length, high, low, lastClose };
}

/**
 * Answers analysis commands from the prices and candles already synced into
 * the store. No upstream market API is called from here.
 */
export const storeAnalysis: AnalysisPort = {
  async run(feature: AnalysisFeature, coin: Coin, user: User): Promise<string> {
    const title = `${coin.name} (${coin.symbol.toUpperCase()})`;
    const price = await getCoinPrice(coin.id, 'usd');

    if (feature === 'quick') {
      return `${title}: ${formatUsd(price?.price ?? null)} (${formatPct(price?.priceChange24h ?? null)} 24h)`;
    }
    if (feature === 'news') {
      return `${title}: no news feed is configured for this bot.`;
    }

    const days = isTimeInterval(user.preferredTimeframe) ? user.preferredTimeframe : TimeInterval.THIRTY_DAYS;
    const candles = await listOhlc(coin.id, days);
    const s = summarizeCandles(candles);
    if (feature === 'chart') {
      const last = candles[0];
      if (!last) return `${title}: no candles stored for ${days}d.`;
      if (user.preferredChartType === ChartType.CANDLE) {
        return `${title} ${days}d, last candle: O ${formatUsd(last.open)} H ${formatUsd(last.high)} L ${formatUsd(last.low)} C ${formatUsd(last.close)}`;
      }
      return `${title} ${days}d: ${s.count} candles, last close ${formatUsd(s.lastClose)}`;
    }

    return [
      title,
      `Price: ${formatUsd(price?.price ?? null)}`,
      `24h change: ${formatPct(price?.priceChange24h ?? null)}`,
      `Market cap: ${formatUsd(price?.marketCap ?? null)}`,
      `${days}d range: ${formatUsd(s.low)} - ${formatUsd(s.high)}`,
    ].join('\n');
  },
};
