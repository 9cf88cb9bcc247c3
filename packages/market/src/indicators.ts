// Indicators over daily closes. Each returns null when the series is too short.

import type { Candle } from "./types.js";

export interface TechnicalSnapshot {
  price: number;
  sma7: number | null;
  sma20: number | null;
  ema12: number | null;
  rsi14: number | null;
  support: number | null;
  resistance: number | null;
  trend: "bullish" | "bearish" | "neutral";
}

export interface VolatilityStats {
  /** Standard deviation of daily close-to-close returns, in percent. */
  dailyVolatilityPct: number;
  /** Widest single-day high/low range relative to its open, in percent. */
  maxDailyRangePct: number;
  averageDailyRangePct: number;
}

export function calculateSMA(prices: number[], period: number): number | null {
  if (period <= 0 || prices.length < period) return null;
  const slice = prices.slice(-period);
  return slice.reduce((sum, p) => sum + p, 0) / period;
}

export function calculateEMA(prices: number[], period: number): number | null {
  if (period <= 0 || prices.length < period) return null;

  const multiplier = 2 / (period + 1);
  // seeded with the SMA of the first window
  let ema = prices.slice(0, period).reduce((sum, p) => sum + p, 0) / period;
  for (const price of prices.slice(period)) {
    ema = (price - ema) * multiplier + ema;
  }
  return ema;
}

export function calculateRSI(prices: number[], period = 14): number | null {
  if (prices.length < period + 1) return null;

  const recent = prices.slice(-(period + 1));
  let gains = 0;
  let losses = 0;
  for (let i = 1; i < recent.length; i++) {
    const change = recent[i] - recent[i - 1];
    if (change > 0) gains += change;
    else losses -= change;
  }

  if (losses === 0) return 100;
  // average gain / average loss; the period cancels
  const rs = gains / losses;
  return Math.round((100 - 100 / (1 + rs)) * 100) / 100;
}

/** Lowest low and highest high over the last `lookback` candles. */
export function supportResistance(
  candles: Candle[],
  lookback = 14,
): { support: number | null; resistance: number | null } {
  const window = candles.slice(-lookback);
  if (window.length === 0) return { support: null, resistance: null };
  return {
    support: Math.min(...window.map((c) => c.low)),
    resistance: Math.max(...window.map((c) => c.high)),
  };
}

export function technicalSnapshot(candles: Candle[]): TechnicalSnapshot {
  const closes = candles.map((c) => c.close);
  const price = closes[closes.length - 1] ?? 0;
  const sma7 = calculateSMA(closes, 7);
  const sma20 = calculateSMA(closes, 20);

  let trend: TechnicalSnapshot["trend"] = "neutral";
  const reference = sma20 ?? sma7;
  if (reference !== null) {
    if (price > reference * 1.01) trend = "bullish";
    else if (price < reference * 0.99) trend = "bearish";
  }

  return {
    price,
    sma7,
    sma20,
    ema12: calculateEMA(closes, 12),
    rsi14: calculateRSI(closes, 14),
    ...supportResistance(candles),
    trend,
  };
}

export function volatilityStats(candles: Candle[]): VolatilityStats {
  const returns: number[] = [];
  for (let i = 1; i < candles.length; i++) {
    const prev = candles[i - 1];
    const cur = candles[i];
    if (prev && cur && prev.close !== 0) {
      returns.push(((cur.close - prev.close) / prev.close) * 100);
    }
  }

  const mean = returns.length > 0 ? returns.reduce((s, r) => s + r, 0) / returns.length : 0;
  const variance =
    returns.length > 0 ? returns.reduce((s, r) => s + (r - mean) ** 2, 0) / returns.length : 0;

  const ranges = candles
    .filter((c) => c.open !== 0)
    .map((c) => ((c.high - c.low) / c.open) * 100);

  return {
    dailyVolatilityPct: Math.sqrt(variance),
    maxDailyRangePct: ranges.length > 0 ? Math.max(...ranges) : 0,
    averageDailyRangePct:
      ranges.length > 0 ? ranges.reduce((s, r) => s + r, 0) / ranges.length : 0,
  };
}
