import { getLogger } from "@coinsage/core";
import type { GatewayDeps } from "./types.js";
import type { ChannelAdapter, ChannelStatus } from "./channel-adapter.js";

const logger = getLogger("channel-registry");

/**
 * Owns the channel adapters. Starts them in registration order and stops
 * only the ones that started, last first.
 */
export class ChannelRegistry {
  private adapters = new Map<string, ChannelAdapter>();
  private running: ChannelAdapter[] = [];

  register(adapter: ChannelAdapter): void {
    if (this.adapters.has(adapter.id)) {
      throw new Error(`Channel adapter already registered: ${adapter.id}`);
    }
    this.adapters.set(adapter.id, adapter);
  }

  /** A failed start is logged and skipped. Resolves the ids that started. */
  async startAll(deps: GatewayDeps): Promise<string[]> {
    for (const adapter of this.adapters.values()) {
      if (this.running.includes(adapter)) continue;
      try {
        await adapter.start(deps);
        this.running.push(adapter);
        logger.info({ channel: adapter.id }, `${adapter.label} started`);
      } catch (err) {
        logger.error({ err, channel: adapter.id }, `Failed to start ${adapter.label}`);
      }
    }
    return this.running.map((a) => a.id);
  }

  async stopAll(): Promise<void> {
    const running = this.running.reverse();
    this.running = [];
    for (const adapter of running) {
      try {
        await adapter.stop();
        logger.info({ channel: adapter.id }, `${adapter.label} stopped`);
      } catch (err) {
        logger.error({ err, channel: adapter.id }, `Error stopping ${adapter.label}`);
      }
    }
  }

  getAllStatus(): Record<string, ChannelStatus> {
    const result: Record<string, ChannelStatus> = {};
    for (const [id, adapter] of this.adapters) {
      result[id] = adapter.getStatus();
    }
    return result;
  }

  list(): string[] {
    return Array.from(this.adapters.keys());
  }
}
