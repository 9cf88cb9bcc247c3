import { describe, it, expect } from "vitest";
import { configSchema } from "@coinsage/core";
import { LLMAnalysisProvider, createPremiumProviderFactory } from "../analysis/provider.js";
import { buildAnalysisPrompt, ANALYSIS_SYSTEM_PROMPT } from "../analysis/prompt.js";
import type { AnalysisContext } from "../analysis/types.js";
import { mockLLM } from "./fakes.js";

const context: AnalysisContext = {
  focus: "risk",
  marketData: "BTC Price History (Last 2 days):",
  supplement: "ACCOUNT BALANCE: 10.00 USDT",
};

describe("buildAnalysisPrompt", () => {
  it("embeds the question, the market data and the supplement", () => {
    const prompt = buildAnalysisPrompt("Is it risky?", context);

    expect(prompt).toContain("Is it risky?");
    expect(prompt).toContain("BTC Price History (Last 2 days):");
    expect(prompt).toContain("ACCOUNT BALANCE: 10.00 USDT");
  });
});

describe("LLMAnalysisProvider", () => {
  it("sends the system prompt and parses the reply", async () => {
    const llm = mockLLM(['{"intention": "sell", "amount": 0.004, "confidence": 0.65, "risk_level": "high"}']);
    const provider = new LLMAnalysisProvider(llm);

    const result = await provider.analyze("Is it risky?", context);

    expect(result).toMatchObject({ intention: "sell", amount: 0.004, confidence: 0.65, riskLevel: "high" });
    expect(llm.calls[0]?.[0]).toEqual({ role: "system", content: ANALYSIS_SYSTEM_PROMPT });
    expect(llm.calls[0]?.[1]?.role).toBe("user");
  });

  it("applies its default amount", async () => {
    const provider = new LLMAnalysisProvider(mockLLM(['{"intention": "buy"}']), 0.005);

    expect((await provider.analyze("Buy?", context)).amount).toBe(0.005);
  });

  it("analyze resolves a fallback when the backend fails", async () => {
    const provider = new LLMAnalysisProvider(mockLLM([new Error("socket hang up")]));

    const result = await provider.analyze("Is it risky?", context);

    expect(result).toEqual({
      intention: "nothing",
      analysis: "Analysis unavailable: socket hang up",
      suggestedAction: "Technical error occurred. Please try again.",
      amount: 0.001,
      confidence: 0,
      riskLevel: "high",
    });
  });

  it("analyzeStrict rejects when the backend fails", async () => {
    const provider = new LLMAnalysisProvider(mockLLM([new Error("socket hang up")]));

    await expect(provider.analyzeStrict("Is it risky?", context)).rejects.toThrow("socket hang up");
  });
});

describe("createPremiumProviderFactory", () => {
  it("returns null for a provider without a key", () => {
    const factory = createPremiumProviderFactory(configSchema.parse({}));

    expect(factory("openai")).toBeNull();
    expect(factory("gemini")).toBeNull();
  });

  it("builds each configured provider once", () => {
    const factory = createPremiumProviderFactory(configSchema.parse({ openaiApiKey: "test-secret" }));

    const first = factory("openai");
    expect(first?.name).toBe("openai");
    expect(factory("openai")).toBe(first);
  });
});
