import type { Candle } from "./types.js";

const usd = new Intl.NumberFormat("en-US", {
  style: "currency",
  currency: "USD",
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/** `65432.1` → `$65,432.10` */
export function formatUsd(n: number): string {
  return usd.format(n);
}

/** `0.001` → `0.001000 BTC` */
export function formatBtc(n: number): string {
  return `${n.toFixed(6)} BTC`;
}

/** Percentage with sign, e.g. `+2.35%`. */
export function formatPct(n: number): string {
  if (!Number.isFinite(n)) return "N/A";
  const sign = n >= 0 ? "+" : "";
  return `${sign}${n.toFixed(2)}%`;
}

export function formatDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

/** Close-to-close change over the series in percent, or 0 for fewer than two rows. */
export function periodChangePct(candles: Candle[]): number {
  const first = candles[0];
  const last = candles[candles.length - 1];
  if (!first || !last || candles.length < 2 || first.close === 0) return 0;
  return ((last.close - first.close) / first.close) * 100;
}

const LLM_TABLE_ROWS = 15;

/**
 * Plain-text table of the most recent daily candles followed by the period
 * change, high and low. This is what every analysis prompt embeds.
 */
export function formatPriceDataForLlm(candles: Candle[]): string {
  if (candles.length === 0) return "No price data available";

  const rows = candles.slice(-LLM_TABLE_ROWS);
  const lines = [
    `BTC Price History (Last ${rows.length} days):`,
    "Date | Open | High | Low | Close | Volume",
    "-".repeat(50),
    ...rows.map(
      (c) =>
        `${formatDate(c.openTime)} | $${c.open.toFixed(2)} | $${c.high.toFixed(2)} | ` +
        `$${c.low.toFixed(2)} | $${c.close.toFixed(2)} | ${c.volume.toFixed(2)}`,
    ),
  ];

  const first = candles[0];
  const last = candles[candles.length - 1];
  if (first && last && candles.length > 1) {
    const change = last.close - first.close;
    const high = Math.max(...candles.map((c) => c.high));
    const low = Math.min(...candles.map((c) => c.low));
    lines.push(
      "",
      `Period Change: $${change.toFixed(2)} (${periodChangePct(candles).toFixed(2)}%)`,
      `Highest: $${high.toFixed(2)}`,
      `Lowest: $${low.toFixed(2)}`,
    );
  }

  return lines.join("\n");
}
