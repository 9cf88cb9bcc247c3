import type { OutgoingMessage, Platform } from "@coinsage/core";
import type { IntentDispatcher, LLMProvider } from "@coinsage/agent";
import type { MarketDataProvider } from "@coinsage/market";

/**
 * Platform-agnostic context for a channel message.
 * Each adapter (Telegram, console) maps its native context into this shape.
 */
export interface ChannelContext {
  userId: string;
  userName?: string;
  chatId: string;
  platform: Platform;
  sendReply: (message: OutgoingMessage) => Promise<void>;
}

export interface GatewaySettings {
  /** Show Execute/Cancel buttons for proposed trades. */
  enableTrading: boolean;
  /** Append the intent/backend block to every reply. */
  showDebugInfo: boolean;
  /** Only this chat may talk to the bot; unset allows everyone. */
  authorizedChatId?: string;
  testnet: boolean;
}

/**
 * Shared dependencies injected into every channel adapter and the CommandRouter.
 */
export interface GatewayDeps {
  dispatcher: Pick<IntentDispatcher, "handle" | "runIntent">;
  market: MarketDataProvider;
  /** Backends shown by /status and probed by /ai. */
  backends: {
    intent: LLMProvider;
    analysis: LLMProvider;
  };
  settings: GatewaySettings;
}
