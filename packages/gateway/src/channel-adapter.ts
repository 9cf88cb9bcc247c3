import type { GatewayDeps } from "./types.js";

export interface ChannelStatus {
  connected: boolean;
  /** Epoch ms of the last user input handled. */
  lastMessageAt: number | null;
  lastError: string | null;
}

/**
 * A chat front end. Every adapter turns its platform's input into
 * CommandRouter calls and renders replies with formatMessage.
 */
export interface ChannelAdapter {
  /** "telegram" or "console"; unique within a ChannelRegistry. */
  readonly id: string;
  readonly label: string;

  /** Resolves once the channel accepts input. Rejects if it cannot. */
  start(deps: GatewayDeps): Promise<void>;
  /** Waits for in-flight replies, then disconnects. */
  stop(): Promise<void>;
  getStatus(): ChannelStatus;
}
