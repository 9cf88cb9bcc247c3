import Anthropic from "@anthropic-ai/sdk";
import { getLogger } from "@coinsage/core";
import { DEFAULT_LLM_SETTINGS } from "./types.js";
import type { LLMProvider, LLMMessage, LLMChatOptions, LLMResponse, LLMSettings } from "./types.js";

const logger = getLogger("llm-anthropic");

const DEFAULT_MODEL = "claude-sonnet-4-20250514";

type ConversationMessage = LLMMessage & { role: "user" | "assistant" };

function isConversationMessage(m: LLMMessage): m is ConversationMessage {
  return m.role !== "system";
}

export function createAnthropicProvider(
  apiKey: string,
  model?: string,
  settings: LLMSettings = DEFAULT_LLM_SETTINGS,
): LLMProvider {
  const client = new Anthropic({ apiKey, timeout: settings.timeoutMs, maxRetries: 0 });
  const modelId = model || DEFAULT_MODEL;

  logger.info({ model: modelId }, "Anthropic provider initialized");

  return {
    name: "anthropic",
    model: modelId,

    async chat(messages: LLMMessage[], options?: LLMChatOptions): Promise<LLMResponse> {
      // System prompt travels separately from the conversation
      const system = messages
        .filter((m) => m.role === "system")
        .map((m) => m.content)
        .join("\n\n");
      const conversationMessages = messages
        .filter(isConversationMessage)
        .map((m) => ({ role: m.role, content: m.content }));

      logger.debug({ messageCount: conversationMessages.length }, "Sending chat request");

      const response = await client.messages.create({
        model: modelId,
        max_tokens: options?.maxTokens ?? settings.maxTokens,
        temperature: options?.temperature ?? settings.temperature,
        ...(system ? { system } : {}),
        messages: conversationMessages,
      });

      let content = "";
      for (const block of response.content) {
        if (block.type === "text") {
          content += block.text;
        }
      }

      logger.debug(
        {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
        "Chat response received",
      );

      return {
        content,
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
      };
    },

    async healthCheck(): Promise<boolean> {
      try {
        await client.messages.create({
          model: modelId,
          max_tokens: 1,
          messages: [{ role: "user", content: "Hello" }],
        });
        return true;
      } catch (err) {
        logger.warn({ err }, "Anthropic health check failed");
        return false;
      }
    },
  };
}
