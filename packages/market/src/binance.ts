import { z } from "zod";
import { getLogger, fetchJson, errorMessage } from "@coinsage/core";
import { MarketDataError } from "./errors.js";
import type {
  AccountBalances,
  BuyingPower,
  Candle,
  MarketDataProvider,
  PortfolioSnapshot,
  SimulatedOrder,
  TradeRequest,
} from "./types.js";

const logger = getLogger("binance");

const DAY_MS = 24 * 60 * 60 * 1000;
const FEE_RESERVE = 0.999;

/** Balances reported in place of a real account; no private keys are wired in. */
export const DEMO_BALANCES: AccountBalances = {
  BTC: { free: 0.001, locked: 0 },
  USDT: { free: 1000, locked: 0 },
};

// ─── Response Schemas ───────────────────────────────────────

const decimal = z.string().transform(Number).pipe(z.number().finite());

const tickerSchema = z.object({ price: decimal });

// [openTime, open, high, low, close, volume, closeTime, ...]
const klineSchema = z
  .tuple([z.number(), decimal, decimal, decimal, decimal, decimal])
  .rest(z.unknown());

const klinesSchema = z.array(klineSchema);

// ─── Client ─────────────────────────────────────────────────

export interface BinanceClientOptions {
  baseUrl?: string;
  symbol?: string;
  timeoutMs?: number;
  balances?: AccountBalances;
}

/**
 * Public-endpoint Binance client. Prices are live; balances are the demo
 * figures and every order is simulated.
 */
export class BinanceMarketClient implements MarketDataProvider {
  private readonly baseUrl: string;
  private readonly symbol: string;
  private readonly timeoutMs: number;
  private readonly balances: AccountBalances;

  constructor(options: BinanceClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? "https://api.binance.com").replace(/\/+$/, "");
    this.symbol = options.symbol ?? "BTCUSDT";
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.balances = options.balances ?? DEMO_BALANCES;
    logger.info({ baseUrl: this.baseUrl, symbol: this.symbol }, "Binance client initialized (public API only)");
  }

  async currentPrice(): Promise<number> {
    const url = new URL("/api/v3/ticker/price", this.baseUrl);
    url.searchParams.set("symbol", this.symbol);

    const body = await this.request(url, "Failed to fetch BTC price");
    const parsed = tickerSchema.safeParse(body);
    if (!parsed.success) {
      throw new MarketDataError("Unexpected ticker response", { cause: parsed.error });
    }

    logger.debug({ price: parsed.data.price }, "Fetched spot price");
    return parsed.data.price;
  }

  async history(days: number): Promise<Candle[]> {
    const endTime = Date.now();
    const startTime = endTime - days * DAY_MS;

    const url = new URL("/api/v3/klines", this.baseUrl);
    url.searchParams.set("symbol", this.symbol);
    url.searchParams.set("interval", "1d");
    url.searchParams.set("startTime", String(startTime));
    url.searchParams.set("endTime", String(endTime));
    url.searchParams.set("limit", String(days));

    const body = await this.request(url, "Failed to fetch price history");
    const parsed = klinesSchema.safeParse(body);
    if (!parsed.success) {
      throw new MarketDataError("Unexpected klines response", { cause: parsed.error });
    }

    const candles = parsed.data.map(([openTime, open, high, low, close, volume]) => ({
      openTime: new Date(openTime),
      open,
      high,
      low,
      close,
      volume,
    }));

    logger.info({ days, points: candles.length }, "Fetched price history");
    return candles;
  }

  async accountBalances(): Promise<AccountBalances> {
    return {
      BTC: { ...this.balances.BTC },
      USDT: { ...this.balances.USDT },
    };
  }

  async usdtBalance(): Promise<number> {
    const { USDT } = await this.accountBalances();
    return USDT.free + USDT.locked;
  }

  async btcBalance(): Promise<number> {
    const { BTC } = await this.accountBalances();
    return BTC.free + BTC.locked;
  }

  async portfolioValue(): Promise<PortfolioSnapshot> {
    const btcBalance = await this.btcBalance();
    const usdtBalance = await this.usdtBalance();
    const btcPrice = await this.currentPrice();
    return computePortfolio(btcBalance, usdtBalance, btcPrice);
  }

  async buyingPower(): Promise<BuyingPower> {
    const usdtBalance = await this.usdtBalance();
    const btcPrice = await this.currentPrice();
    return computeBuyingPower(usdtBalance, btcPrice);
  }

  async executeTrade(request: TradeRequest): Promise<SimulatedOrder> {
    return request.side === "buy"
      ? this.placeBuyOrder(this.symbol, request.amount)
      : this.placeSellOrder(this.symbol, request.amount);
  }

  async placeBuyOrder(symbol: string, quantity: number): Promise<SimulatedOrder> {
    logger.info({ symbol, quantity }, "Simulating buy order");
    return {
      status: "simulated",
      message: `Buy order simulated: ${quantity} ${symbol}`,
      symbol,
      side: "BUY",
      quantity,
    };
  }

  async placeSellOrder(symbol: string, quantity: number): Promise<SimulatedOrder> {
    logger.info({ symbol, quantity }, "Simulating sell order");
    return {
      status: "simulated",
      message: `Sell order simulated: ${quantity} ${symbol}`,
      symbol,
      side: "SELL",
      quantity,
    };
  }

  private async request(url: URL, failure: string): Promise<unknown> {
    try {
      return await fetchJson(url, undefined, { timeoutMs: this.timeoutMs });
    } catch (err) {
      logger.error({ err, path: url.pathname }, failure);
      throw new MarketDataError(`${failure}: ${errorMessage(err)}`, { cause: err });
    }
  }
}

// ─── Derived Figures ────────────────────────────────────────

export function computePortfolio(
  btcBalance: number,
  usdtBalance: number,
  btcPrice: number,
): PortfolioSnapshot {
  const btcValue = btcBalance * btcPrice;
  const totalValue = btcValue + usdtBalance;
  return {
    btcBalance,
    btcPrice,
    btcValue,
    usdtBalance,
    totalValue,
    btcAllocationPct: totalValue > 0 ? (btcValue / totalValue) * 100 : 0,
    usdtAllocationPct: totalValue > 0 ? (usdtBalance / totalValue) * 100 : 0,
  };
}

export function computeBuyingPower(usdtBalance: number, btcPrice: number): BuyingPower {
  const usableUsdt = usdtBalance * FEE_RESERVE;
  return {
    usdtBalance,
    btcPrice,
    usableUsdt,
    maxBtcBuyable: btcPrice > 0 ? usableUsdt / btcPrice : 0,
  };
}
