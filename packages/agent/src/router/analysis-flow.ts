import { getLogger } from "@coinsage/core";
import type { TradeRequest } from "@coinsage/market";
import { comparePremiumAnalysis } from "../analysis/comparison.js";
import type {
  AnalysisContext,
  ComparisonResult,
  TradingAnalysis,
} from "../analysis/types.js";
import { formatAnalysisLines, formatComparisonSection } from "./format.js";
import type { HandlerRequest, HandlerResponse, EnvelopeData } from "./types.js";

const logger = getLogger("analysis-flow");

/** The only gate for showing a trade confirmation. */
export function requiresTradeConfirmation(analysis: Pick<TradingAnalysis, "intention" | "amount">): boolean {
  return (analysis.intention === "buy" || analysis.intention === "sell") && analysis.amount > 0;
}

export function proposedTradeFor(analysis: TradingAnalysis): TradeRequest | undefined {
  if (!requiresTradeConfirmation(analysis)) return undefined;
  return {
    side: analysis.intention === "buy" ? "buy" : "sell",
    amount: analysis.amount,
  };
}

export interface AnalysisOutcome {
  analysis: TradingAnalysis;
  comparison?: ComparisonResult;
}

/**
 * Standard analysis, or the premium comparison when the classification asked
 * for a configured premium backend. A failed comparison falls back to the
 * standard path without telling the user.
 */
export async function runAnalysis(
  request: HandlerRequest,
  context: AnalysisContext,
): Promise<AnalysisOutcome> {
  const { intent, services, text } = request;
  const requested = intent.requestedProvider;

  if (intent.premiumRequested && requested !== "none") {
    const premium = services.premium(requested);
    if (premium && premium.name !== services.analysis.name) {
      const comparison = await comparePremiumAnalysis(
        text,
        context,
        services.analysis,
        premium,
        requested,
      );
      if (comparison) {
        return { analysis: comparison.final, comparison };
      }
    } else {
      logger.info({ requested }, "Premium provider unavailable or same as primary, using standard analysis");
    }
  }

  return { analysis: await services.analysis.analyze(text, context) };
}

interface AnalysisResponseOptions {
  responseType: string;
  title: string;
  /** Lines before the analysis block (portfolio figures, indicators). */
  preamble?: string[];
  suggestionLabel?: string;
  /** Lines after the analysis block. */
  footer?: string[];
  portfolio?: Extract<EnvelopeData, { kind: "analysis" }>["portfolio"];
}

export function analysisResponse(
  outcome: AnalysisOutcome,
  options: AnalysisResponseOptions,
): HandlerResponse {
  const { analysis, comparison } = outcome;
  const lines = [
    options.title,
    ...(options.preamble ?? []),
    ...formatAnalysisLines(analysis, options.suggestionLabel),
  ];

  const trade = proposedTradeFor(analysis);
  if (trade) {
    lines.push(`🔄 Suggested Action: ${trade.side.toUpperCase()} ${trade.amount} BTC`);
  }
  lines.push(...(options.footer ?? []));
  if (comparison) {
    lines.push(...formatComparisonSection(comparison));
  }

  return {
    responseType: comparison ? `premium_${options.responseType}` : options.responseType,
    data: {
      kind: "analysis",
      analysis,
      ...(options.portfolio ? { portfolio: options.portfolio } : {}),
      ...(comparison ? { comparison } : {}),
    },
    message: lines.join("\n"),
    success: true,
    requiresTradeConfirmation: trade !== undefined,
    ...(trade ? { proposedTrade: trade } : {}),
  };
}
