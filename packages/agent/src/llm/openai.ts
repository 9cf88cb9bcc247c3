import OpenAI from "openai";
import { getLogger } from "@coinsage/core";
import { DEFAULT_LLM_SETTINGS } from "./types.js";
import type { LLMProvider, LLMMessage, LLMChatOptions, LLMResponse, LLMSettings } from "./types.js";

const logger = getLogger("llm-openai");

const DEFAULT_MODEL = "gpt-4o-mini";

// Models that accept response_format: json_object
const JSON_MODE_MODELS = new Set(["gpt-4o", "gpt-4o-mini", "gpt-3.5-turbo-1106", "gpt-4-turbo"]);

export function supportsJsonMode(model: string): boolean {
  return JSON_MODE_MODELS.has(model);
}

export function createOpenAIProvider(
  apiKey: string,
  model?: string,
  settings: LLMSettings = DEFAULT_LLM_SETTINGS,
): LLMProvider {
  // No SDK retries: one attempt per call, bounded by the timeout
  const client = new OpenAI({ apiKey, timeout: settings.timeoutMs, maxRetries: 0 });
  const modelId = model || DEFAULT_MODEL;

  logger.info({ model: modelId }, "OpenAI provider initialized");

  return {
    name: "openai",
    model: modelId,

    async chat(messages: LLMMessage[], options?: LLMChatOptions): Promise<LLMResponse> {
      const openaiMessages: OpenAI.ChatCompletionMessageParam[] = messages.map((m) => ({
        role: m.role,
        content: m.content,
      }));

      logger.debug({ messageCount: messages.length }, "Sending chat request");

      const wantsJson = options?.json !== false && supportsJsonMode(modelId);
      const response = await client.chat.completions.create({
        model: modelId,
        messages: openaiMessages,
        temperature: options?.temperature ?? settings.temperature,
        max_tokens: options?.maxTokens ?? settings.maxTokens,
        ...(wantsJson ? { response_format: { type: "json_object" as const } } : {}),
      });

      const content = response.choices[0]?.message?.content ?? "";

      logger.debug(
        {
          inputTokens: response.usage?.prompt_tokens,
          outputTokens: response.usage?.completion_tokens,
        },
        "Chat response received",
      );

      return {
        content,
        usage: response.usage
          ? {
              inputTokens: response.usage.prompt_tokens,
              outputTokens: response.usage.completion_tokens,
            }
          : undefined,
      };
    },

    async healthCheck(): Promise<boolean> {
      try {
        await client.chat.completions.create({
          model: modelId,
          messages: [{ role: "user", content: "Hello" }],
          max_tokens: 1,
        });
        return true;
      } catch (err) {
        logger.warn({ err }, "OpenAI health check failed");
        return false;
      }
    },
  };
}
