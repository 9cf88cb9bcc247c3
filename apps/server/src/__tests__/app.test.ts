import { describe, it, expect } from "vitest";
import { configSchema, ProviderConfigError, type Config } from "@coinsage/core";
import { buildApp, consoleChannelEnabled } from "../app.js";

function config(overrides: Partial<Config> = {}): Config {
  return { ...configSchema.parse({}), ...overrides };
}

describe("buildApp", () => {
  it("falls back to the console when no Telegram token is set", () => {
    const { channels } = buildApp(config());

    expect(channels.list()).toEqual(["console"]);
  });

  it("runs Telegram alone when a token is set", () => {
    const { channels } = buildApp(config({ telegramBotToken: "test-token" }));

    expect(channels.list()).toEqual(["telegram"]);
  });

  it("runs both when the console is enabled explicitly", () => {
    const { channels } = buildApp(config({ telegramBotToken: "test-token", consoleEnabled: true }));

    expect(channels.list()).toEqual(["telegram", "console"]);
  });

  it("passes presentation and auth settings to the gateway", () => {
    const { deps } = buildApp(
      config({ enableTrading: true, showDebugInfo: false, telegramChatId: "42", binanceTestnet: false }),
    );

    expect(deps.settings).toEqual({
      enableTrading: true,
      showDebugInfo: false,
      authorizedChatId: "42",
      testnet: false,
    });
  });

  it("uses separate backends for intent and analysis", () => {
    const { deps } = buildApp(
      config({ intentProvider: "ollama", analysisProvider: "openai", openaiApiKey: "test-secret" }),
    );

    expect(deps.backends.intent.name).toBe("ollama");
    expect(deps.backends.analysis.name).toBe("openai");
    expect(deps.backends.analysis.model).toBe("gpt-4o-mini");
  });

  it("fails fast when a chosen backend has no API key", () => {
    expect(() => buildApp(config({ analysisProvider: "gemini" }))).toThrow(ProviderConfigError);
  });
});

describe("consoleChannelEnabled", () => {
  it("is on without a Telegram token or when enabled explicitly", () => {
    expect(consoleChannelEnabled(config())).toBe(true);
    expect(consoleChannelEnabled(config({ telegramBotToken: "test-token", consoleEnabled: true }))).toBe(true);
  });

  it("is off for a Telegram-only setup", () => {
    expect(consoleChannelEnabled(config({ telegramBotToken: "test-token" }))).toBe(false);
  });
});
