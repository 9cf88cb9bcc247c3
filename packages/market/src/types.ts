// ─── Price Data ─────────────────────────────────────────────

/** One daily OHLCV row. */
export interface Candle {
  openTime: Date;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

// ─── Balances ───────────────────────────────────────────────

export interface AssetBalance {
  free: number;
  locked: number;
}

export interface AccountBalances {
  BTC: AssetBalance;
  USDT: AssetBalance;
}

export interface PortfolioSnapshot {
  btcBalance: number;
  btcPrice: number;
  btcValue: number;
  usdtBalance: number;
  totalValue: number;
  btcAllocationPct: number;
  usdtAllocationPct: number;
}

export interface BuyingPower {
  usdtBalance: number;
  btcPrice: number;
  /** USDT left after the 0.1% fee reserve. */
  usableUsdt: number;
  maxBtcBuyable: number;
}

// ─── Orders ─────────────────────────────────────────────────

export type TradeSide = "buy" | "sell";

export interface TradeRequest {
  side: TradeSide;
  amount: number;
}

export interface SimulatedOrder {
  status: "simulated";
  message: string;
  symbol: string;
  side: "BUY" | "SELL";
  quantity: number;
}

// ─── Provider Interface ─────────────────────────────────────

/**
 * Everything the handlers need from a price source. Implemented by
 * BinanceMarketClient; tests substitute in-memory fakes.
 */
export interface MarketDataProvider {
  currentPrice(): Promise<number>;
  history(days: number): Promise<Candle[]>;
  accountBalances(): Promise<AccountBalances>;
  usdtBalance(): Promise<number>;
  btcBalance(): Promise<number>;
  portfolioValue(): Promise<PortfolioSnapshot>;
  buyingPower(): Promise<BuyingPower>;
  executeTrade(request: TradeRequest): Promise<SimulatedOrder>;
}
