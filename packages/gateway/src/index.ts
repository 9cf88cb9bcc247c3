// Channel adapter system
export type { ChannelAdapter, ChannelStatus } from "./channel-adapter.js";
export { ChannelRegistry } from "./channel-registry.js";

// Adapters
export { TelegramAdapter } from "./telegram.js";
export { ConsoleAdapter, type ConsoleAdapterOptions } from "./console.js";

// Presentation
export {
  presentEnvelope,
  tradeButtons,
  tradeCallbackData,
  parseTradeCallback,
  CANCEL_CALLBACK,
  type PresentOptions,
} from "./presenter.js";
export { formatMessage } from "./formatter.js";

// Shared
export { CommandRouter } from "./router.js";
export { RateLimiter } from "./rate-limiter.js";
export type { ChannelContext, GatewayDeps, GatewaySettings } from "./types.js";
