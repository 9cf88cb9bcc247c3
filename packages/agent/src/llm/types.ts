import type { LLMProviderName } from "@coinsage/core";

export interface LLMMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface LLMChatOptions {
  temperature?: number;
  maxTokens?: number;
  /** Ask the backend for a bare JSON object where it has a mode for that. */
  json?: boolean;
}

export interface LLMResponse {
  content: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

/** Sampling and transport defaults applied to every call unless overridden. */
export interface LLMSettings {
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
}

export interface LLMProvider {
  name: LLMProviderName;
  model: string;
  chat(messages: LLMMessage[], options?: LLMChatOptions): Promise<LLMResponse>;
  /** Cheap reachability probe; resolves false instead of throwing. */
  healthCheck(): Promise<boolean>;
}

export const DEFAULT_LLM_SETTINGS: LLMSettings = {
  temperature: 0.3,
  maxTokens: 1000,
  timeoutMs: 60_000,
};
