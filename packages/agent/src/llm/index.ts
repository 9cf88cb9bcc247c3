import { ProviderConfigError, type Config, type LLMProviderName } from "@coinsage/core";
import { createAnthropicProvider } from "./anthropic.js";
import { createGeminiProvider } from "./gemini.js";
import { createOpenAIProvider } from "./openai.js";
import { createOllamaProvider } from "./ollama.js";
import type { LLMProvider, LLMSettings } from "./types.js";

export type {
  LLMProvider,
  LLMMessage,
  LLMChatOptions,
  LLMResponse,
  LLMSettings,
} from "./types.js";
export { DEFAULT_LLM_SETTINGS } from "./types.js";
export { supportsJsonMode } from "./openai.js";

export function llmSettingsFromConfig(config: Config): LLMSettings {
  return {
    temperature: config.llmTemperature,
    maxTokens: config.llmMaxTokens,
    timeoutMs: config.llmTimeoutMs,
  };
}

/** True when the backend has what it needs to be constructed. */
export function isProviderConfigured(config: Config, name: LLMProviderName): boolean {
  switch (name) {
    case "ollama":
      return true;
    case "openai":
      return Boolean(config.openaiApiKey);
    case "gemini":
      return Boolean(config.geminiApiKey);
    case "anthropic":
      return Boolean(config.anthropicApiKey);
  }
}

export function createLLMProvider(config: Config, name: LLMProviderName): LLMProvider {
  const settings = llmSettingsFromConfig(config);

  switch (name) {
    case "anthropic": {
      if (!config.anthropicApiKey) {
        throw new ProviderConfigError("ANTHROPIC_API_KEY is required for the anthropic provider");
      }
      return createAnthropicProvider(config.anthropicApiKey, config.anthropicModel, settings);
    }
    case "openai": {
      if (!config.openaiApiKey) {
        throw new ProviderConfigError("OPENAI_API_KEY is required for the openai provider");
      }
      return createOpenAIProvider(config.openaiApiKey, config.openaiModel, settings);
    }
    case "gemini": {
      if (!config.geminiApiKey) {
        throw new ProviderConfigError("GEMINI_API_KEY is required for the gemini provider");
      }
      return createGeminiProvider(config.geminiApiKey, config.geminiModel, settings);
    }
    case "ollama":
      return createOllamaProvider(config.ollamaBaseUrl, config.ollamaModel, settings);
  }
}
