import type { IntentClassification, RequestedProvider } from "./types.js";

/**
 * The general classifier rarely picks news_sentiment on its own, so any of
 * these substrings routes there directly and the model is not consulted.
 */
export const NEWS_KEYWORDS = [
  "news",
  "sentiment",
  "headline",
  "social media",
  "fear and greed",
  "fear & greed",
  "fud",
] as const;

const COMPARISON_KEYWORDS = ["compare", "comparison", " vs "];

export function findNewsKeyword(text: string): string | undefined {
  const lowered = text.toLowerCase();
  return NEWS_KEYWORDS.find((keyword) => lowered.includes(keyword));
}

export interface PremiumRequest {
  premiumRequested: boolean;
  requestedProvider: RequestedProvider;
  comparisonRequested: boolean;
}

export function detectPremiumRequest(text: string): PremiumRequest {
  const lowered = text.toLowerCase();

  let requestedProvider: RequestedProvider = "none";
  if (lowered.includes("openai") || lowered.includes("gpt")) requestedProvider = "openai";
  else if (lowered.includes("gemini")) requestedProvider = "gemini";

  return {
    premiumRequested: requestedProvider !== "none" || lowered.includes("premium"),
    requestedProvider,
    comparisonRequested: COMPARISON_KEYWORDS.some((k) => lowered.includes(k)),
  };
}

/** Synthetic classification for the keyword fast path; null when no keyword matches. */
export function keywordOverride(text: string): IntentClassification | null {
  const keyword = findNewsKeyword(text);
  if (!keyword) return null;

  return {
    intent: "news_sentiment",
    confidence: 0.95,
    reasoning: `Matched news/sentiment keyword "${keyword}"`,
    suggestedHandler: "news_sentiment",
    requiredData: ["price_history"],
    queryType: "analysis",
    ...detectPremiumRequest(text),
    source: "keyword",
  };
}
