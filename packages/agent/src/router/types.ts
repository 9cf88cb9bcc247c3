import type {
  BuyingPower,
  Candle,
  MarketDataProvider,
  PortfolioSnapshot,
  TradeRequest,
} from "@coinsage/market";
import type {
  AnalysisProvider,
  ComparisonResult,
  TradingAnalysis,
} from "../analysis/types.js";
import type { PremiumProviderFactory } from "../analysis/provider.js";
import type {
  ClassificationSource,
  IntentClassification,
  IntentName,
  RequestedProvider,
} from "../intent/types.js";

// ─── Envelope ───────────────────────────────────────────────

export interface PriceLevel {
  label: string;
  price: number;
  /** Distance from spot, in percent. */
  distancePct: number;
}

export interface StopLossLevel {
  pct: number;
  price: number;
  /** USDT lost on current BTC holdings if the stop fills. */
  loss: number;
}

export interface DcaPlan {
  weeks: number;
  perBuyUsdt: number;
  perBuyBtc: number;
}

export interface TimeframeChange {
  days: number;
  changePct: number;
}

export type EnvelopeData =
  | { kind: "empty" }
  | { kind: "price"; currentPrice: number; history: Candle[] }
  | { kind: "balance"; usdtBalance: number; buyingPower: BuyingPower }
  | { kind: "portfolio"; portfolio: PortfolioSnapshot }
  | {
      kind: "analysis";
      analysis: TradingAnalysis;
      portfolio?: PortfolioSnapshot;
      comparison?: ComparisonResult;
    }
  | { kind: "alerts"; currentPrice: number; levels: PriceLevel[] }
  | { kind: "history"; candles: Candle[] }
  | { kind: "stop_loss"; currentPrice: number; btcBalance: number; levels: StopLossLevel[] }
  | { kind: "dca"; currentPrice: number; usdtBalance: number; plans: DcaPlan[] }
  | { kind: "timeframes"; currentPrice: number; changes: TimeframeChange[]; trend: string }
  | { kind: "error"; error: string };

export interface IntentInfo {
  intent: IntentName;
  confidence: number;
  reasoning: string;
  handler: string;
  source: ClassificationSource;
  premiumRequested: boolean;
  requestedProvider: RequestedProvider;
}

export interface ResponseEnvelope {
  responseType: string;
  data: EnvelopeData;
  message: string;
  success: boolean;
  requiresTradeConfirmation: boolean;
  /** Present exactly when requiresTradeConfirmation is true. */
  proposedTrade?: TradeRequest;
  intentInfo?: IntentInfo;
}

/** What a handler produces; the dispatcher attaches intentInfo. */
export type HandlerResponse = Omit<ResponseEnvelope, "intentInfo">;

// ─── Handlers ───────────────────────────────────────────────

export interface DispatcherSettings {
  /** Days of candles fed to analysis prompts. */
  priceAnalysisDays: number;
  /** Adds a testnet notice to balance replies. */
  testnet: boolean;
}

export interface HandlerServices {
  market: MarketDataProvider;
  analysis: AnalysisProvider;
  premium: PremiumProviderFactory;
  settings: DispatcherSettings;
}

export interface HandlerRequest {
  text: string;
  intent: IntentClassification;
  services: HandlerServices;
  /** Set when error_recovery runs because something else failed. */
  error?: string;
}

export interface IntentHandler {
  /** Reported in intentInfo.handler. */
  name: string;
  /** Prefix for the user-facing message when the handler throws. */
  errorLabel: string;
  handle(request: HandlerRequest): Promise<HandlerResponse>;
}

export type HandlerTable = Record<IntentName, IntentHandler>;
