import { describe, it, expect } from "vitest";
import {
  IntentClassifier,
  fallbackClassification,
  parseIntentClassification,
} from "../intent/parser.js";
import { detectPremiumRequest, findNewsKeyword, keywordOverride } from "../intent/keywords.js";
import { mockLLM } from "./fakes.js";

describe("keyword override", () => {
  it("matches news keywords case-insensitively", () => {
    expect(findNewsKeyword("Any NEWS today?")).toBe("news");
    expect(findNewsKeyword("what's the Fear and Greed index")).toBe("fear and greed");
    expect(findNewsKeyword("What's BTC price?")).toBeUndefined();
  });

  it("builds a high-confidence news_sentiment classification", () => {
    expect(keywordOverride("market sentiment please")).toMatchObject({
      intent: "news_sentiment",
      confidence: 0.95,
      reasoning: 'Matched news/sentiment keyword "sentiment"',
      source: "keyword",
      premiumRequested: false,
      requestedProvider: "none",
    });
  });

  it("returns null without a keyword", () => {
    expect(keywordOverride("Should I buy?")).toBeNull();
  });

  it("detects a named premium provider", () => {
    expect(detectPremiumRequest("compare with gemini")).toEqual({
      premiumRequested: true,
      requestedProvider: "gemini",
      comparisonRequested: true,
    });
    expect(detectPremiumRequest("ask GPT about it").requestedProvider).toBe("openai");
  });
});

describe("parseIntentClassification", () => {
  it("reads a full reply", () => {
    const raw = JSON.stringify({
      intent: "trading_decision",
      confidence: 0.9,
      reasoning: "User asks whether to buy",
      suggested_handler: "trading_decision",
      required_data: ["price_history", "balances"],
      query_type: "trading",
      premium_ai_requested: true,
      requested_ai_provider: "openai",
      comparison_analysis: true,
    });

    expect(parseIntentClassification(raw)).toEqual({
      intent: "trading_decision",
      confidence: 0.9,
      reasoning: "User asks whether to buy",
      suggestedHandler: "trading_decision",
      requiredData: ["price_history", "balances"],
      queryType: "trading",
      premiumRequested: true,
      requestedProvider: "openai",
      comparisonRequested: true,
      source: "llm",
    });
  });

  it("treats a named provider as a premium request", () => {
    const result = parseIntentClassification('{"intent": "market_analysis", "requested_ai_provider": "gemini"}');

    expect(result.premiumRequested).toBe(true);
    expect(result.requestedProvider).toBe("gemini");
  });

  it("remaps unknown intents to error_recovery and keeps the confidence", () => {
    const result = parseIntentClassification('{"intent": "moon_prediction", "confidence": 0.8}');

    expect(result.intent).toBe("error_recovery");
    expect(result.confidence).toBe(0.8);
    expect(result.reasoning).toBe("Unknown intent detected: moon_prediction");
    expect(result.source).toBe("llm");
  });

  it("falls back when the intent field is missing or not a string", () => {
    expect(parseIntentClassification('{"confidence": 0.9}')).toEqual(
      fallbackClassification("Intent parsing error: intent is missing"),
    );
    expect(parseIntentClassification('{"intent": 5}').reasoning).toBe(
      "Intent parsing error: intent must be a string",
    );
  });

  it("falls back on undecodable text", () => {
    const result = parseIntentClassification("The user wants the price.");

    expect(result.intent).toBe("error_recovery");
    expect(result.confidence).toBe(0);
    expect(result.reasoning).toBe("JSON parsing error: No JSON object found in model response");
    expect(result.source).toBe("fallback");
  });

  it("clamps confidence and defaults bad optional fields", () => {
    const result = parseIntentClassification(
      '{"intent": "btc_price_info", "confidence": 3, "query_type": "gossip", "required_data": "price"}',
    );

    expect(result.confidence).toBe(1);
    expect(result.queryType).toBe("consultation");
    expect(result.requiredData).toEqual([]);
    expect(result.suggestedHandler).toBe("btc_price_info");
  });
});

describe("IntentClassifier", () => {
  it("classifies through the model", async () => {
    const llm = mockLLM(['{"intent": "btc_price_info", "confidence": 0.97}']);
    const classifier = new IntentClassifier(llm);

    const result = await classifier.classify("What's BTC price?");

    expect(result.intent).toBe("btc_price_info");
    expect(llm.calls).toHaveLength(1);
    expect(llm.calls[0]?.[0]?.content).toContain("What's BTC price?");
  });

  it("never calls the model when a news keyword matches", async () => {
    const llm = mockLLM(['{"intent": "btc_price_info"}']);
    const classifier = new IntentClassifier(llm);

    const result = await classifier.classify("latest bitcoin headlines?");

    expect(result.intent).toBe("news_sentiment");
    expect(llm.calls).toHaveLength(0);
  });

  it("falls back when the model call fails", async () => {
    const classifier = new IntentClassifier(mockLLM([new Error("connect ECONNREFUSED")]));

    const result = await classifier.classify("Should I buy?");

    expect(result).toEqual(
      fallbackClassification("Intent classification failed: connect ECONNREFUSED"),
    );
  });
});
