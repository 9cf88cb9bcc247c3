import type { OutgoingMessage, ReplyButton } from "@coinsage/core";
import {
  MAX_TRADE_AMOUNT,
  MIN_TRADE_AMOUNT,
  type LLMProvider,
  type ResponseEnvelope,
} from "@coinsage/agent";
import type { TradeRequest, TradeSide } from "@coinsage/market";

export interface PresentOptions {
  enableTrading: boolean;
  showDebugInfo: boolean;
  backends?: {
    intent: Pick<LLMProvider, "name" | "model">;
    analysis: Pick<LLMProvider, "name" | "model">;
  };
}

export const CANCEL_CALLBACK = "cancel";
const EXECUTE_PREFIX = "execute";

/** `execute:buy:0.002` */
export function tradeCallbackData(trade: TradeRequest): string {
  return `${EXECUTE_PREFIX}:${trade.side}:${trade.amount}`;
}

/**
 * Inverse of tradeCallbackData; null for anything malformed or for an
 * amount outside the analysis bounds.
 */
export function parseTradeCallback(data: string): TradeRequest | null {
  const parts = data.split(":");
  const [prefix, rawSide, rawAmount] = parts;
  if (parts.length !== 3 || prefix !== EXECUTE_PREFIX) return null;

  const side: TradeSide | null = rawSide === "buy" || rawSide === "sell" ? rawSide : null;
  const amount = Number(rawAmount);
  if (!side || !Number.isFinite(amount)) return null;
  if (amount < MIN_TRADE_AMOUNT || amount > MAX_TRADE_AMOUNT) return null;
  return { side, amount };
}

export function tradeButtons(trade: TradeRequest): ReplyButton[] {
  return [
    { label: "✅ Execute Trade", data: tradeCallbackData(trade) },
    { label: "❌ Cancel", data: CANCEL_CALLBACK },
  ];
}

function debugBlock(envelope: ResponseEnvelope, options: PresentOptions): string[] {
  const info = envelope.intentInfo;
  if (!info) return [];

  const lines = [
    "",
    "🔍 *Debug Info:*",
    `Intent: \`${info.intent}\` (confidence: ${info.confidence.toFixed(2)})`,
    `Function: \`${info.handler}\``,
  ];
  if (options.backends) {
    const { intent, analysis } = options.backends;
    lines.push(`Intent AI: ${intent.name} (${intent.model})`);
    lines.push(`Analysis AI: ${analysis.name} (${analysis.model})`);
  }
  return lines;
}

/**
 * Turn a dispatcher envelope into one outgoing message: header, body,
 * optional debug block, and the trade confirmation when one is proposed.
 */
export function presentEnvelope(envelope: ResponseEnvelope, options: PresentOptions): OutgoingMessage {
  const lines = ["🤖 *Bot Response:*", "", envelope.message];

  if (options.showDebugInfo) {
    lines.push(...debugBlock(envelope, options));
  }

  const trade = envelope.requiresTradeConfirmation ? envelope.proposedTrade : undefined;
  if (!trade) {
    return { text: lines.join("\n"), parseMode: "Markdown" };
  }

  lines.push("", `🔄 *Proposed Action:* ${trade.side.toUpperCase()} ${trade.amount} BTC`);
  if (!options.enableTrading) {
    lines.push("", "ℹ️ Trading is disabled. Enable it in config to execute trades.");
    return { text: lines.join("\n"), parseMode: "Markdown" };
  }

  return { text: lines.join("\n"), parseMode: "Markdown", buttons: tradeButtons(trade) };
}
