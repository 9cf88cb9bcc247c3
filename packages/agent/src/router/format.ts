import { formatUsd } from "@coinsage/market";
import type { ComparisonResult, TradingAnalysis } from "../analysis/types.js";

/** `0.756` → `75.6%` */
export function formatConfidence(confidence: number): string {
  return `${(confidence * 100).toFixed(1)}%`;
}

export function formatAnalysisLines(
  analysis: TradingAnalysis,
  suggestionLabel = "Suggestion",
): string[] {
  return [
    `📊 Analysis: ${analysis.analysis}`,
    `💡 ${suggestionLabel}: ${analysis.suggestedAction}`,
    `🎯 Confidence: ${formatConfidence(analysis.confidence)}`,
    `⚠️ Risk Level: ${analysis.riskLevel.toUpperCase()}`,
  ];
}

const OUTCOME_LABELS: Record<ComparisonResult["outcome"], string> = {
  agreement: "✅ Both providers agree",
  partial_agreement: "🟡 Same direction, different confidence",
  conflict: "🔴 Providers disagree, holding",
};

function describe(analysis: TradingAnalysis): string {
  const action = analysis.intention === "nothing" ? "HOLD" : analysis.intention.toUpperCase();
  return `${action} · ${formatConfidence(analysis.confidence)} · ${analysis.riskLevel} risk`;
}

export function formatComparisonSection(comparison: ComparisonResult): string[] {
  return [
    "",
    `🧠 Premium AI Comparison (${comparison.premiumProvider}):`,
    `  • ${comparison.primaryProvider}: ${describe(comparison.primary)}`,
    `  • ${comparison.premiumProvider}: ${describe(comparison.premium)}`,
    `  ${OUTCOME_LABELS[comparison.outcome]}`,
    `  ${comparison.summary}`,
    "  💸 Premium analysis uses a paid API.",
  ];
}

export function formatTestnetNotice(testnet: boolean): string[] {
  return testnet ? ["  ℹ️ This is testnet data"] : [];
}

export function formatPriceLine(label: string, price: number): string {
  return `${label}: ${formatUsd(price)}`;
}
