import { GoogleGenAI } from "@google/genai";
import { getLogger } from "@coinsage/core";
import { DEFAULT_LLM_SETTINGS } from "./types.js";
import type { LLMProvider, LLMMessage, LLMChatOptions, LLMResponse, LLMSettings } from "./types.js";

const logger = getLogger("llm-gemini");

const DEFAULT_MODEL = "gemini-2.0-flash";

export function createGeminiProvider(
  apiKey: string,
  model?: string,
  settings: LLMSettings = DEFAULT_LLM_SETTINGS,
): LLMProvider {
  const ai = new GoogleGenAI({ apiKey, httpOptions: { timeout: settings.timeoutMs } });
  const modelId = model || DEFAULT_MODEL;

  logger.info({ model: modelId }, "Gemini provider initialized");

  return {
    name: "gemini",
    model: modelId,

    async chat(messages: LLMMessage[], options?: LLMChatOptions): Promise<LLMResponse> {
      const systemInstruction = messages
        .filter((m) => m.role === "system")
        .map((m) => m.content)
        .join("\n\n");
      const contents = messages
        .filter((m) => m.role !== "system")
        .map((m) => ({
          role: m.role === "assistant" ? "model" : "user",
          parts: [{ text: m.content }],
        }));

      logger.debug({ messageCount: contents.length }, "Sending chat request");

      const response = await ai.models.generateContent({
        model: modelId,
        contents,
        config: {
          temperature: options?.temperature ?? settings.temperature,
          maxOutputTokens: options?.maxTokens ?? settings.maxTokens,
          ...(systemInstruction ? { systemInstruction } : {}),
          ...(options?.json !== false ? { responseMimeType: "application/json" } : {}),
        },
      });

      const usage = response.usageMetadata;
      logger.debug(
        { inputTokens: usage?.promptTokenCount, outputTokens: usage?.candidatesTokenCount },
        "Chat response received",
      );

      return {
        content: response.text ?? "",
        usage:
          usage?.promptTokenCount != null
            ? {
                inputTokens: usage.promptTokenCount,
                outputTokens: usage.candidatesTokenCount ?? 0,
              }
            : undefined,
      };
    },

    async healthCheck(): Promise<boolean> {
      try {
        await ai.models.generateContent({
          model: modelId,
          contents: "Hello",
          config: { maxOutputTokens: 1 },
        });
        return true;
      } catch (err) {
        logger.warn({ err }, "Gemini health check failed");
        return false;
      }
    },
  };
}
