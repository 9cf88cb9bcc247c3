import type { LLMProviderName } from "@coinsage/core";

export const intentions = ["buy", "sell", "consult", "nothing"] as const;
export type Intention = (typeof intentions)[number];

export const riskLevels = ["low", "medium", "high"] as const;
export type RiskLevel = (typeof riskLevels)[number];

export const MIN_TRADE_AMOUNT = 0.001;
export const MAX_TRADE_AMOUNT = 0.01;

export interface TradingAnalysis {
  intention: Intention;
  analysis: string;
  suggestedAction: string;
  endpoint?: string;
  /** BTC, always within [MIN_TRADE_AMOUNT, MAX_TRADE_AMOUNT] when parsed from a model. */
  amount: number;
  confidence: number;
  riskLevel: RiskLevel;
}

export type AnalysisFocus =
  | "market"
  | "risk"
  | "trading"
  | "volatile"
  | "portfolio"
  | "technical"
  | "news"
  | "educational";

export interface AnalysisContext {
  focus: AnalysisFocus;
  /** Output of formatPriceDataForLlm(). */
  marketData: string;
  /** Extra figures for the focus: volatility, indicators, allocation. */
  supplement?: string;
}

export interface AnalysisProvider {
  readonly name: LLMProviderName;
  /** Never rejects: backend failures come back as the safe fallback analysis. */
  analyze(text: string, context: AnalysisContext): Promise<TradingAnalysis>;
  /** Same request, but rejects when the backend call fails. */
  analyzeStrict(text: string, context: AnalysisContext): Promise<TradingAnalysis>;
}

// ─── Premium Comparison ─────────────────────────────────────

export const premiumProviders = ["openai", "gemini"] as const;
export type PremiumProvider = (typeof premiumProviders)[number];

export type ComparisonOutcome = "agreement" | "partial_agreement" | "conflict";

export interface ComparisonResult {
  outcome: ComparisonOutcome;
  final: TradingAnalysis;
  primary: TradingAnalysis;
  premium: TradingAnalysis;
  primaryProvider: LLMProviderName;
  premiumProvider: PremiumProvider;
  summary: string;
}
