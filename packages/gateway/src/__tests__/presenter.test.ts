import { describe, it, expect } from "vitest";
import type { ResponseEnvelope } from "@coinsage/agent";
import { parseTradeCallback, presentEnvelope, tradeCallbackData } from "../presenter.js";

function envelope(overrides: Partial<ResponseEnvelope> = {}): ResponseEnvelope {
  return {
    responseType: "btc_price_info",
    data: { kind: "empty" },
    message: "₿ Current BTC Price: $50,000.00",
    success: true,
    requiresTradeConfirmation: false,
    intentInfo: {
      intent: "btc_price_info",
      confidence: 0.97,
      reasoning: "price",
      handler: "btc_price_info",
      source: "llm",
      premiumRequested: false,
      requestedProvider: "none",
    },
    ...overrides,
  };
}

const backends = {
  intent: { name: "ollama" as const, model: "llama3.2" },
  analysis: { name: "openai" as const, model: "gpt-4o-mini" },
};

describe("presentEnvelope", () => {
  it("wraps the message with a header", () => {
    const out = presentEnvelope(envelope(), { enableTrading: false, showDebugInfo: false });

    expect(out).toEqual({
      text: "🤖 *Bot Response:*\n\n₿ Current BTC Price: $50,000.00",
      parseMode: "Markdown",
    });
  });

  it("appends the debug block with both backends", () => {
    const out = presentEnvelope(envelope(), { enableTrading: false, showDebugInfo: true, backends });

    expect(out.text.split("\n").slice(3)).toEqual([
      "",
      "🔍 *Debug Info:*",
      "Intent: `btc_price_info` (confidence: 0.97)",
      "Function: `btc_price_info`",
      "Intent AI: ollama (llama3.2)",
      "Analysis AI: openai (gpt-4o-mini)",
    ]);
  });

  it("offers Execute and Cancel buttons when trading is enabled", () => {
    const out = presentEnvelope(
      envelope({ requiresTradeConfirmation: true, proposedTrade: { side: "buy", amount: 0.002 } }),
      { enableTrading: true, showDebugInfo: false },
    );

    expect(out.text.endsWith("🔄 *Proposed Action:* BUY 0.002 BTC")).toBe(true);
    expect(out.buttons).toEqual([
      { label: "✅ Execute Trade", data: "execute:buy:0.002" },
      { label: "❌ Cancel", data: "cancel" },
    ]);
  });

  it("shows a disabled notice instead of buttons when trading is off", () => {
    const out = presentEnvelope(
      envelope({ requiresTradeConfirmation: true, proposedTrade: { side: "sell", amount: 0.001 } }),
      { enableTrading: false, showDebugInfo: false },
    );

    expect(out.buttons).toBeUndefined();
    expect(out.text.split("\n").slice(-3)).toEqual([
      "🔄 *Proposed Action:* SELL 0.001 BTC",
      "",
      "ℹ️ Trading is disabled. Enable it in config to execute trades.",
    ]);
  });

  it("ignores a proposed trade when no confirmation is required", () => {
    const out = presentEnvelope(
      envelope({ proposedTrade: { side: "buy", amount: 0.002 } }),
      { enableTrading: true, showDebugInfo: false },
    );

    expect(out.buttons).toBeUndefined();
    expect(out.text).not.toContain("Proposed Action");
  });
});

describe("trade callbacks", () => {
  it("round-trips a trade through the button payload", () => {
    expect(parseTradeCallback(tradeCallbackData({ side: "sell", amount: 0.005 }))).toEqual({
      side: "sell",
      amount: 0.005,
    });
  });

  it("rejects malformed payloads", () => {
    expect(parseTradeCallback("execute:hold:0.001")).toBeNull();
    expect(parseTradeCallback("execute:buy:abc")).toBeNull();
    expect(parseTradeCallback("execute:buy:0")).toBeNull();
    expect(parseTradeCallback("execute:buy")).toBeNull();
    expect(parseTradeCallback("cancel")).toBeNull();
  });

  it("rejects amounts outside the trade bounds", () => {
    expect(parseTradeCallback("execute:buy:5")).toBeNull();
    expect(parseTradeCallback("execute:sell:0.0005")).toBeNull();
    expect(parseTradeCallback("execute:buy:0.001")).toEqual({ side: "buy", amount: 0.001 });
    expect(parseTradeCallback("execute:sell:0.01")).toEqual({ side: "sell", amount: 0.01 });
  });
});
