export {
  BinanceMarketClient,
  DEMO_BALANCES,
  computePortfolio,
  computeBuyingPower,
  type BinanceClientOptions,
} from "./binance.js";
export { MarketDataError } from "./errors.js";
export {
  formatUsd,
  formatBtc,
  formatPct,
  formatDate,
  periodChangePct,
  formatPriceDataForLlm,
} from "./format.js";
export {
  calculateSMA,
  calculateEMA,
  calculateRSI,
  supportResistance,
  technicalSnapshot,
  volatilityStats,
  type TechnicalSnapshot,
  type VolatilityStats,
} from "./indicators.js";
export type {
  Candle,
  AssetBalance,
  AccountBalances,
  PortfolioSnapshot,
  BuyingPower,
  TradeSide,
  TradeRequest,
  SimulatedOrder,
  MarketDataProvider,
} from "./types.js";
