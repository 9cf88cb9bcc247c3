export {
  createLLMProvider,
  llmSettingsFromConfig,
  isProviderConfigured,
  supportsJsonMode,
  DEFAULT_LLM_SETTINGS,
} from "./llm/index.js";
export type { LLMProvider, LLMMessage, LLMChatOptions, LLMResponse, LLMSettings } from "./llm/index.js";

export { JsonExtractionError, extractJsonObject, parseJsonObject, flattenToText } from "./json.js";

export { IntentClassifier, parseIntentClassification, fallbackClassification } from "./intent/parser.js";
export { NEWS_KEYWORDS, findNewsKeyword, detectPremiumRequest, keywordOverride } from "./intent/keywords.js";
export { intentNames, isIntentName } from "./intent/types.js";
export type {
  IntentName,
  IntentClassification,
  QueryType,
  RequestedProvider,
  ClassificationSource,
} from "./intent/types.js";

export { LLMAnalysisProvider, createPremiumProviderFactory } from "./analysis/provider.js";
export type { PremiumProviderFactory } from "./analysis/provider.js";
export { parseTradingAnalysis, fallbackAnalysis } from "./analysis/parser.js";
export { reconcileAnalyses, comparePremiumAnalysis, confidenceGap, AGREEMENT_THRESHOLD } from "./analysis/comparison.js";
export { MIN_TRADE_AMOUNT, MAX_TRADE_AMOUNT } from "./analysis/types.js";
export type {
  TradingAnalysis,
  Intention,
  RiskLevel,
  AnalysisContext,
  AnalysisFocus,
  AnalysisProvider,
  ComparisonResult,
  ComparisonOutcome,
  PremiumProvider,
} from "./analysis/types.js";

export { IntentDispatcher, resolveHandler, directClassification } from "./router/dispatcher.js";
export type { DispatcherDeps } from "./router/dispatcher.js";
export { HANDLERS, HELP_TEXT } from "./router/handlers.js";
export { requiresTradeConfirmation } from "./router/analysis-flow.js";
export { formatConfidence } from "./router/format.js";
export type {
  ResponseEnvelope,
  EnvelopeData,
  IntentInfo,
  HandlerResponse,
  HandlerServices,
  HandlerTable,
  IntentHandler,
  DispatcherSettings,
} from "./router/types.js";
