import { getLogger, errorMessage, type OutgoingMessage } from "@coinsage/core";
import { HELP_TEXT, type IntentName, type ResponseEnvelope } from "@coinsage/agent";
import { formatUsd } from "@coinsage/market";
import { CANCEL_CALLBACK, parseTradeCallback, presentEnvelope } from "./presenter.js";
import type { ChannelContext, GatewayDeps } from "./types.js";

const logger = getLogger("router");

const WELCOME_TEXT = [
  "🤖 *Crypto Trading Bot*",
  "",
  "I'm your AI-powered trading assistant! I can help you:",
  "",
  "• Analyze BTC price trends",
  "• Get current prices and portfolio data",
  "• Suggest trading opportunities",
  "• Execute simulated trades (with confirmation)",
  "",
  "*Ask me anything:*",
  '• _"What\'s the current BTC price?"_',
  '• _"How much USDT do I have?"_',
  '• _"Should I buy Bitcoin now?"_',
  "",
  "*Commands:* /price /balance /portfolio /status /ai /help",
  "",
  "⚠️ *Important:* All trades require your confirmation!",
].join("\n");

function text(body: string): OutgoingMessage {
  return { text: body, parseMode: "Markdown" };
}

/**
 * Platform-agnostic command router.
 * Handles all shared command logic; channel adapters map native events into
 * ChannelContext and call these methods.
 */
export class CommandRouter {
  constructor(private deps: GatewayDeps) {}

  /**
   * Check the sender against the configured chat id.
   * Returns true if blocked (caller should stop processing).
   */
  private async checkBlocked(ctx: ChannelContext): Promise<boolean> {
    const allowed = this.deps.settings.authorizedChatId;
    if (!allowed || ctx.platform === "console") return false;
    if (ctx.chatId === allowed || ctx.userId === allowed) return false;

    logger.info({ userId: ctx.userId, chatId: ctx.chatId, platform: ctx.platform }, "Unauthorized sender");
    await ctx.sendReply({ text: "❌ Unauthorized user." });
    return true;
  }

  private present(envelope: ResponseEnvelope): OutgoingMessage {
    const { settings, backends } = this.deps;
    return presentEnvelope(envelope, {
      enableTrading: settings.enableTrading,
      showDebugInfo: settings.showDebugInfo,
      backends,
    });
  }

  private async runIntent(ctx: ChannelContext, intent: IntentName, command: string): Promise<void> {
    if (await this.checkBlocked(ctx)) return;
    const envelope = await this.deps.dispatcher.runIntent(intent, command);
    await ctx.sendReply(this.present(envelope));
  }

  // ─── /start & /help ────────────────────────────────────────

  async handleStart(ctx: ChannelContext): Promise<void> {
    if (await this.checkBlocked(ctx)) return;
    await ctx.sendReply(text(WELCOME_TEXT));
  }

  async handleHelp(ctx: ChannelContext): Promise<void> {
    if (await this.checkBlocked(ctx)) return;
    await ctx.sendReply({ text: HELP_TEXT });
  }

  // ─── Direct intents ────────────────────────────────────────

  async handlePrice(ctx: ChannelContext): Promise<void> {
    await this.runIntent(ctx, "btc_price_info", "/price");
  }

  async handleBalance(ctx: ChannelContext): Promise<void> {
    await this.runIntent(ctx, "usdt_balance_info", "/balance");
  }

  async handlePortfolio(ctx: ChannelContext): Promise<void> {
    await this.runIntent(ctx, "portfolio_value", "/portfolio");
  }

  // ─── /status ───────────────────────────────────────────────

  async handleStatus(ctx: ChannelContext): Promise<void> {
    if (await this.checkBlocked(ctx)) return;
    const { settings, backends, market } = this.deps;

    let marketLine: string;
    try {
      const price = await market.currentPrice();
      marketLine = `Market data: ✅ reachable (BTC ${formatUsd(price)})`;
    } catch (err) {
      logger.warn({ err }, "Status price probe failed");
      marketLine = `Market data: ❌ unreachable (${errorMessage(err)})`;
    }

    await ctx.sendReply(
      text(
        [
          "📊 *System Status:*",
          "",
          `Trading: ${settings.enableTrading ? "enabled (simulated)" : "disabled"}`,
          `Network: ${settings.testnet ? "testnet" : "mainnet"}`,
          `Intent AI: ${backends.intent.name} (${backends.intent.model})`,
          `Analysis AI: ${backends.analysis.name} (${backends.analysis.model})`,
          marketLine,
        ].join("\n"),
      ),
    );
  }

  // ─── /ai ───────────────────────────────────────────────────

  async handleAi(ctx: ChannelContext): Promise<void> {
    if (await this.checkBlocked(ctx)) return;
    const { intent, analysis } = this.deps.backends;

    const [intentUp, analysisUp] = await Promise.all([intent.healthCheck(), analysis.healthCheck()]);
    const mark = (up: boolean) => (up ? "✅ online" : "❌ offline");

    await ctx.sendReply(
      text(
        [
          "🧠 *AI Provider Status:*",
          "",
          `Intent AI: ${intent.name} (${intent.model}) ${mark(intentUp)}`,
          `Analysis AI: ${analysis.name} (${analysis.model}) ${mark(analysisUp)}`,
        ].join("\n"),
      ),
    );
  }

  // ─── Natural language (catch-all) ──────────────────────────

  async handleMessage(ctx: ChannelContext, message: string): Promise<void> {
    if (await this.checkBlocked(ctx)) return;

    try {
      const envelope = await this.deps.dispatcher.handle(message);
      await ctx.sendReply(this.present(envelope));
    } catch (err) {
      logger.error({ err }, "NL message handling failed");
      await ctx.sendReply({
        text: "❌ Sorry, I encountered an error processing your request. Please try again.",
      });
    }
  }

  // ─── Trade confirmation ────────────────────────────────────

  async handleTradeCallback(ctx: ChannelContext, data: string): Promise<void> {
    if (await this.checkBlocked(ctx)) return;

    if (data === CANCEL_CALLBACK) {
      await ctx.sendReply({ text: "❌ Trade cancelled." });
      return;
    }
    if (!this.deps.settings.enableTrading) {
      await ctx.sendReply({ text: "ℹ️ Trading is disabled. Enable it in config to execute trades." });
      return;
    }

    const trade = parseTradeCallback(data);
    if (!trade) {
      await ctx.sendReply({ text: "❌ Invalid trade data." });
      return;
    }

    try {
      const order = await this.deps.market.executeTrade(trade);
      logger.info({ side: trade.side, amount: trade.amount }, "Trade simulated");
      await ctx.sendReply(
        text(
          [
            "✅ *Trade Simulated!*",
            "",
            `Action: ${trade.side.toUpperCase()}`,
            `Amount: ${trade.amount} BTC`,
            `Status: ${order.message}`,
            "",
            "ℹ️ This was a simulation since we're using public API only.",
          ].join("\n"),
        ),
      );
    } catch (err) {
      logger.error({ err, trade }, "Trade execution failed");
      await ctx.sendReply({ text: "❌ Error executing trade." });
    }
  }
}
