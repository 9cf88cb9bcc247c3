import { describe, it, expect, vi, beforeEach } from "vitest";
import { HELP_TEXT } from "@coinsage/agent";
import { CommandRouter } from "../router.js";
import { backend, createCtx, createDeps, envelope } from "./fakes.js";

describe("CommandRouter", () => {
  let setup: ReturnType<typeof createDeps>;
  let router: CommandRouter;

  beforeEach(() => {
    setup = createDeps();
    router = new CommandRouter(setup.deps);
  });

  // ─── Authorization ─────────────────────────────────────

  describe("authorization", () => {
    it("rejects other chats when a chat id is configured", async () => {
      router = new CommandRouter(createDeps({ authorizedChatId: "999" }).deps);
      const { ctx, replies } = createCtx();

      await router.handleMessage(ctx, "What's BTC price?");

      expect(replies).toEqual([{ text: "❌ Unauthorized user." }]);
    });

    it("accepts the configured chat", async () => {
      const { deps, dispatcher } = createDeps({ authorizedChatId: "chat-456" });
      router = new CommandRouter(deps);
      const { ctx } = createCtx();

      await router.handleMessage(ctx, "What's BTC price?");

      expect(dispatcher.handle).toHaveBeenCalledWith("What's BTC price?");
    });

    it("always allows the local console", async () => {
      router = new CommandRouter(createDeps({ authorizedChatId: "999" }).deps);
      const { ctx, replies } = createCtx({ platform: "console", chatId: "console" });

      await router.handleStart(ctx);

      expect(replies[0]?.text).toContain("Crypto Trading Bot");
    });
  });

  // ─── Commands ──────────────────────────────────────────

  it("/help sends the help text", async () => {
    const { ctx, replies } = createCtx();

    await router.handleHelp(ctx);

    expect(replies).toEqual([{ text: HELP_TEXT }]);
  });

  it("/price runs the price intent directly", async () => {
    const { ctx, replies } = createCtx();

    await router.handlePrice(ctx);

    expect(setup.dispatcher.runIntent).toHaveBeenCalledWith("btc_price_info", "/price");
    expect(replies[0]?.text).toBe("🤖 *Bot Response:*\n\n₿ Current BTC Price: $50,000.00");
  });

  it("/balance and /portfolio map to their intents", async () => {
    const { ctx } = createCtx();

    await router.handleBalance(ctx);
    await router.handlePortfolio(ctx);

    expect(setup.dispatcher.runIntent).toHaveBeenNthCalledWith(1, "usdt_balance_info", "/balance");
    expect(setup.dispatcher.runIntent).toHaveBeenNthCalledWith(2, "portfolio_value", "/portfolio");
  });

  it("/status reports settings, backends and market reachability", async () => {
    const { ctx, replies } = createCtx();

    await router.handleStatus(ctx);

    expect(replies[0]?.text.split("\n")).toEqual([
      "📊 *System Status:*",
      "",
      "Trading: enabled (simulated)",
      "Network: testnet",
      "Intent AI: ollama (llama3.2)",
      "Analysis AI: openai (gpt-4o-mini)",
      "Market data: ✅ reachable (BTC $50,000.00)",
    ]);
  });

  it("/status reports an unreachable market", async () => {
    vi.mocked(setup.deps.market.currentPrice).mockRejectedValue(new Error("fetch failed"));
    const { ctx, replies } = createCtx();

    await router.handleStatus(ctx);

    expect(replies[0]?.text).toContain("Market data: ❌ unreachable (fetch failed)");
  });

  it("/ai probes both backends", async () => {
    setup.deps.backends.analysis = backend("openai", "gpt-4o-mini", false);
    const { ctx, replies } = createCtx();

    await router.handleAi(ctx);

    expect(replies[0]?.text.split("\n").slice(2)).toEqual([
      "Intent AI: ollama (llama3.2) ✅ online",
      "Analysis AI: openai (gpt-4o-mini) ❌ offline",
    ]);
  });

  // ─── Natural language ──────────────────────────────────

  it("presents the dispatcher envelope with trade buttons", async () => {
    setup.dispatcher.handle.mockResolvedValue(
      envelope({
        responseType: "trading_decision",
        requiresTradeConfirmation: true,
        proposedTrade: { side: "buy", amount: 0.002 },
      }),
    );
    const { ctx, replies } = createCtx();

    await router.handleMessage(ctx, "Should I buy?");

    expect(replies[0]?.buttons?.map((b) => b.data)).toEqual(["execute:buy:0.002", "cancel"]);
  });

  it("apologises when the dispatcher throws", async () => {
    setup.dispatcher.handle.mockRejectedValue(new Error("boom"));
    const { ctx, replies } = createCtx();

    await router.handleMessage(ctx, "hello");

    expect(replies).toEqual([
      { text: "❌ Sorry, I encountered an error processing your request. Please try again." },
    ]);
  });

  // ─── Trade callbacks ───────────────────────────────────

  describe("handleTradeCallback", () => {
    it("simulates the confirmed trade", async () => {
      const { ctx, replies } = createCtx();

      await router.handleTradeCallback(ctx, "execute:buy:0.002");

      expect(setup.deps.market.executeTrade).toHaveBeenCalledWith({ side: "buy", amount: 0.002 });
      expect(replies[0]?.text.split("\n")).toEqual([
        "✅ *Trade Simulated!*",
        "",
        "Action: BUY",
        "Amount: 0.002 BTC",
        "Status: Buy order simulated: 0.002 BTCUSDT",
        "",
        "ℹ️ This was a simulation since we're using public API only.",
      ]);
    });

    it("cancels", async () => {
      const { ctx, replies } = createCtx();

      await router.handleTradeCallback(ctx, "cancel");

      expect(replies).toEqual([{ text: "❌ Trade cancelled." }]);
      expect(setup.deps.market.executeTrade).not.toHaveBeenCalled();
    });

    it("refuses when trading is disabled", async () => {
      const { deps } = createDeps({ enableTrading: false });
      router = new CommandRouter(deps);
      const { ctx, replies } = createCtx();

      await router.handleTradeCallback(ctx, "execute:buy:0.002");

      expect(replies[0]?.text).toBe("ℹ️ Trading is disabled. Enable it in config to execute trades.");
      expect(deps.market.executeTrade).not.toHaveBeenCalled();
    });

    it("rejects a malformed payload", async () => {
      const { ctx, replies } = createCtx();

      await router.handleTradeCallback(ctx, "execute:buy:lots");

      expect(replies).toEqual([{ text: "❌ Invalid trade data." }]);
    });

    it("refuses an amount above the trade limit", async () => {
      const { ctx, replies } = createCtx();

      await router.handleTradeCallback(ctx, "execute:buy:5");

      expect(replies).toEqual([{ text: "❌ Invalid trade data." }]);
      expect(setup.deps.market.executeTrade).not.toHaveBeenCalled();
    });

    it("reports a failed execution", async () => {
      vi.mocked(setup.deps.market.executeTrade).mockRejectedValue(new Error("down"));
      const { ctx, replies } = createCtx();

      await router.handleTradeCallback(ctx, "execute:sell:0.001");

      expect(replies).toEqual([{ text: "❌ Error executing trade." }]);
    });
  });
});
