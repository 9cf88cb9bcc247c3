import { getLogger } from "@coinsage/core";
import type {
  AnalysisContext,
  AnalysisProvider,
  ComparisonOutcome,
  ComparisonResult,
  PremiumProvider,
  TradingAnalysis,
} from "./types.js";

const logger = getLogger("premium-comparison");

/** Confidence gap under which two same-direction analyses count as agreeing. */
export const AGREEMENT_THRESHOLD = 0.2;

export const CONFLICT_ANALYSIS: Readonly<TradingAnalysis> = {
  intention: "nothing",
  analysis:
    "The primary and premium analyses reached different conclusions. Holding until the signals line up.",
  suggestedAction: "Hold. Conflicting signals between AI providers.",
  amount: 0.001,
  confidence: 0.3,
  riskLevel: "high",
};

/** Absolute confidence difference, rounded so 0.7 - 0.5 reads as 0.2. */
export function confidenceGap(a: number, b: number): number {
  return Math.round(Math.abs(a - b) * 1e6) / 1e6;
}

export function reconcileAnalyses(
  primary: TradingAnalysis,
  premium: TradingAnalysis,
): { outcome: ComparisonOutcome; final: TradingAnalysis } {
  if (primary.intention !== premium.intention) {
    return { outcome: "conflict", final: { ...CONFLICT_ANALYSIS } };
  }

  if (confidenceGap(primary.confidence, premium.confidence) < AGREEMENT_THRESHOLD) {
    return {
      outcome: "agreement",
      final: premium.confidence > primary.confidence ? premium : primary,
    };
  }

  return { outcome: "partial_agreement", final: premium };
}

function summarize(outcome: ComparisonOutcome, premiumProvider: PremiumProvider): string {
  switch (outcome) {
    case "agreement":
      return `Both providers agree; using the more confident analysis.`;
    case "partial_agreement":
      return `Same direction with different conviction; using the ${premiumProvider} analysis.`;
    case "conflict":
      return `Providers disagree; defaulting to a conservative hold.`;
  }
}

/**
 * Run the primary and premium analyses together and reconcile them.
 * Resolves null when either call fails; the caller then takes the
 * single-provider path.
 */
export async function comparePremiumAnalysis(
  text: string,
  context: AnalysisContext,
  primary: AnalysisProvider,
  premium: AnalysisProvider,
  premiumProvider: PremiumProvider,
): Promise<ComparisonResult | null> {
  try {
    const [primaryAnalysis, premiumAnalysis] = await Promise.all([
      primary.analyzeStrict(text, context),
      premium.analyzeStrict(text, context),
    ]);

    const { outcome, final } = reconcileAnalyses(primaryAnalysis, premiumAnalysis);
    logger.info(
      { outcome, premiumProvider, focus: context.focus },
      "Premium comparison reconciled",
    );

    return {
      outcome,
      final,
      primary: primaryAnalysis,
      premium: premiumAnalysis,
      primaryProvider: primary.name,
      premiumProvider,
      summary: summarize(outcome, premiumProvider),
    };
  } catch (err) {
    logger.warn({ err, premiumProvider }, "Premium comparison failed, using standard analysis");
    return null;
  }
}
