export const intentNames = [
  "btc_price_info",
  "usdt_balance_info",
  "portfolio_value",
  "market_analysis",
  "risk_assessment",
  "trading_decision",
  "volatile_market",
  "portfolio_analysis",
  "general_consult",
  "error_recovery",
  "price_alerts",
  "trade_history",
  "technical_analysis",
  "news_sentiment",
  "stop_loss_management",
  "dca_strategy",
  "multi_timeframe",
  "educational_mode",
] as const;

export type IntentName = (typeof intentNames)[number];

export function isIntentName(value: string): value is IntentName {
  return intentNames.some((name) => name === value);
}

export const queryTypes = ["information", "analysis", "trading", "consultation"] as const;
export type QueryType = (typeof queryTypes)[number];

/** "none" or one of the premium analysis backends. */
export const requestedProviders = ["none", "openai", "gemini"] as const;
export type RequestedProvider = (typeof requestedProviders)[number];

/** Where a classification came from: the model, the keyword fast path, or a failure default. */
export type ClassificationSource = "llm" | "keyword" | "fallback";

export interface IntentClassification {
  readonly intent: IntentName;
  readonly confidence: number;
  readonly reasoning: string;
  readonly suggestedHandler: string;
  readonly requiredData: readonly string[];
  readonly queryType: QueryType;
  readonly premiumRequested: boolean;
  readonly requestedProvider: RequestedProvider;
  readonly comparisonRequested: boolean;
  readonly source: ClassificationSource;
}
