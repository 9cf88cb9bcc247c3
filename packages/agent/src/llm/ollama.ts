import { z } from "zod";
import { getLogger, fetchWithTimeout } from "@coinsage/core";
import { DEFAULT_LLM_SETTINGS } from "./types.js";
import type { LLMProvider, LLMMessage, LLMChatOptions, LLMResponse, LLMSettings } from "./types.js";

const logger = getLogger("llm-ollama");

const DEFAULT_MODEL = "llama3.2-vision:11b";
const HEALTH_TIMEOUT_MS = 10_000;

const ollamaResponseSchema = z.object({
  message: z.object({
    role: z.string(),
    content: z.string().default(""),
  }),
  done: z.boolean().optional(),
  eval_count: z.number().optional(),
  prompt_eval_count: z.number().optional(),
});

export function createOllamaProvider(
  baseUrl: string,
  model?: string,
  settings: LLMSettings = DEFAULT_LLM_SETTINGS,
): LLMProvider {
  const modelId = model || DEFAULT_MODEL;
  const url = baseUrl.replace(/\/$/, "");

  logger.info({ model: modelId, baseUrl: url }, "Ollama provider initialized");

  return {
    name: "ollama",
    model: modelId,

    async chat(messages: LLMMessage[], options?: LLMChatOptions): Promise<LLMResponse> {
      logger.debug({ messageCount: messages.length }, "Sending chat request");

      const body: Record<string, unknown> = {
        model: modelId,
        messages: messages.map((m) => ({ role: m.role, content: m.content })),
        stream: false,
        options: {
          temperature: options?.temperature ?? settings.temperature,
          num_predict: options?.maxTokens ?? settings.maxTokens,
        },
      };
      if (options?.json !== false) {
        body.format = "json";
      }

      const response = await fetchWithTimeout(
        `${url}/api/chat`,
        {
          method: "POST",
          headers: { "Content-Type": "application/json" },
          body: JSON.stringify(body),
        },
        { timeoutMs: settings.timeoutMs },
      );

      if (!response.ok) {
        const text = await response.text();
        throw new Error(`Ollama API error ${response.status}: ${text}`);
      }

      const data = ollamaResponseSchema.parse(await response.json());

      logger.debug(
        { inputTokens: data.prompt_eval_count, outputTokens: data.eval_count },
        "Chat response received",
      );

      return {
        content: data.message.content,
        usage:
          data.prompt_eval_count != null
            ? {
                inputTokens: data.prompt_eval_count,
                outputTokens: data.eval_count ?? 0,
              }
            : undefined,
      };
    },

    async healthCheck(): Promise<boolean> {
      try {
        const response = await fetchWithTimeout(`${url}/api/tags`, undefined, {
          timeoutMs: HEALTH_TIMEOUT_MS,
        });
        return response.ok;
      } catch (err) {
        logger.warn({ err }, "Ollama health check failed");
        return false;
      }
    },
  };
}
