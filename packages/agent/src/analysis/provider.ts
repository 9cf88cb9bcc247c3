import { getLogger, errorMessage, type Config, type LLMProviderName } from "@coinsage/core";
import { createLLMProvider, isProviderConfigured } from "../llm/index.js";
import type { LLMProvider } from "../llm/types.js";
import { fallbackAnalysis, parseTradingAnalysis } from "./parser.js";
import { ANALYSIS_SYSTEM_PROMPT, buildAnalysisPrompt } from "./prompt.js";
import type {
  AnalysisContext,
  AnalysisProvider,
  PremiumProvider,
  TradingAnalysis,
} from "./types.js";

const logger = getLogger("analysis");

export class LLMAnalysisProvider implements AnalysisProvider {
  readonly name: LLMProviderName;

  constructor(
    private llm: LLMProvider,
    private defaultAmount?: number,
  ) {
    this.name = llm.name;
  }

  async analyzeStrict(text: string, context: AnalysisContext): Promise<TradingAnalysis> {
    const response = await this.llm.chat(
      [
        { role: "system", content: ANALYSIS_SYSTEM_PROMPT },
        { role: "user", content: buildAnalysisPrompt(text, context) },
      ],
      { json: true },
    );

    logger.debug({ provider: this.name, raw: response.content }, "Analysis reply received");
    const analysis = parseTradingAnalysis(response.content, this.defaultAmount);

    logger.info(
      {
        provider: this.name,
        focus: context.focus,
        intention: analysis.intention,
        confidence: analysis.confidence,
      },
      "Analysis complete",
    );
    return analysis;
  }

  async analyze(text: string, context: AnalysisContext): Promise<TradingAnalysis> {
    try {
      return await this.analyzeStrict(text, context);
    } catch (err) {
      logger.error({ err, provider: this.name }, "Analysis request failed");
      return fallbackAnalysis(
        `Analysis unavailable: ${errorMessage(err)}`,
        "Technical error occurred. Please try again.",
      );
    }
  }
}

export type PremiumProviderFactory = (name: PremiumProvider) => AnalysisProvider | null;

/**
 * Lazily builds one analysis provider per premium backend. Unconfigured
 * backends resolve to null so callers can skip the comparison.
 */
export function createPremiumProviderFactory(config: Config): PremiumProviderFactory {
  const cache = new Map<PremiumProvider, AnalysisProvider>();

  return (name) => {
    const cached = cache.get(name);
    if (cached) return cached;

    if (!isProviderConfigured(config, name)) {
      logger.warn({ provider: name }, "Premium provider requested but not configured");
      return null;
    }

    const provider = new LLMAnalysisProvider(createLLMProvider(config, name), config.defaultTradeAmount);
    cache.set(name, provider);
    return provider;
  };
}
