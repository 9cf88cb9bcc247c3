import { describe, it, expect, vi, beforeEach } from "vitest";
import { configSchema, ProviderConfigError, type Config } from "@coinsage/core";
import { createLLMProvider, isProviderConfigured, supportsJsonMode } from "../llm/index.js";
import { createOllamaProvider } from "../llm/ollama.js";

const baseConfig: Config = configSchema.parse({});

describe("createLLMProvider", () => {
  it("throws when the Anthropic API key is missing", () => {
    expect(() => createLLMProvider(baseConfig, "anthropic")).toThrow(
      "ANTHROPIC_API_KEY is required",
    );
  });

  it("throws ProviderConfigError when the OpenAI API key is missing", () => {
    expect(() => createLLMProvider(baseConfig, "openai")).toThrow(ProviderConfigError);
  });

  it("throws when the Gemini API key is missing", () => {
    expect(() => createLLMProvider(baseConfig, "gemini")).toThrow("GEMINI_API_KEY is required");
  });

  it("creates keyed providers", () => {
    const config = {
      ...baseConfig,
      openaiApiKey: "test-secret",
      geminiApiKey: "test-secret",
      anthropicApiKey: "test-secret",
    };

    expect(createLLMProvider(config, "openai").name).toBe("openai");
    expect(createLLMProvider(config, "gemini").name).toBe("gemini");
    expect(createLLMProvider(config, "anthropic").name).toBe("anthropic");
  });

  it("creates Ollama without a key using the configured model", () => {
    const provider = createLLMProvider({ ...baseConfig, ollamaModel: "llama3.1:8b" }, "ollama");

    expect(provider.name).toBe("ollama");
    expect(provider.model).toBe("llama3.1:8b");
  });
});

describe("isProviderConfigured", () => {
  it("needs a key for hosted providers only", () => {
    expect(isProviderConfigured(baseConfig, "ollama")).toBe(true);
    expect(isProviderConfigured(baseConfig, "openai")).toBe(false);
    expect(isProviderConfigured({ ...baseConfig, openaiApiKey: "test-secret" }, "openai")).toBe(true);
  });
});

describe("supportsJsonMode", () => {
  it("knows which OpenAI models take json_object", () => {
    expect(supportsJsonMode("gpt-4o-mini")).toBe(true);
    expect(supportsJsonMode("gpt-4")).toBe(false);
  });
});

describe("Ollama provider", () => {
  const mockFetch = vi.fn<typeof fetch>();

  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal("fetch", mockFetch);
  });

  it("posts a non-streaming JSON chat request", async () => {
    mockFetch.mockResolvedValue(
      Response.json({
        message: { role: "assistant", content: '{"intent": "btc_price_info"}' },
        done: true,
        prompt_eval_count: 12,
        eval_count: 7,
      }),
    );
    const provider = createOllamaProvider("http://ollama.test/", "llama3.2", {
      temperature: 0.2,
      maxTokens: 500,
      timeoutMs: 5000,
    });

    const response = await provider.chat([{ role: "user", content: "hi" }]);

    expect(response).toEqual({
      content: '{"intent": "btc_price_info"}',
      usage: { inputTokens: 12, outputTokens: 7 },
    });
    expect(mockFetch.mock.calls[0]?.[0]).toBe("http://ollama.test/api/chat");
    const body: unknown = JSON.parse(String(mockFetch.mock.calls[0]?.[1]?.body));
    expect(body).toEqual({
      model: "llama3.2",
      messages: [{ role: "user", content: "hi" }],
      stream: false,
      format: "json",
      options: { temperature: 0.2, num_predict: 500 },
    });
  });

  it("omits the JSON format when asked for free text", async () => {
    mockFetch.mockResolvedValue(Response.json({ message: { role: "assistant", content: "ok" } }));
    const provider = createOllamaProvider("http://ollama.test");

    await provider.chat([{ role: "user", content: "hi" }], { json: false });

    const body: unknown = JSON.parse(String(mockFetch.mock.calls[0]?.[1]?.body));
    expect(body).not.toHaveProperty("format");
  });

  it("rejects on a non-2xx status", async () => {
    mockFetch.mockResolvedValue(new Response("model not found", { status: 404 }));
    const provider = createOllamaProvider("http://ollama.test");

    await expect(provider.chat([{ role: "user", content: "hi" }])).rejects.toThrow(
      "Ollama API error 404: model not found",
    );
  });

  it("health check resolves false instead of throwing", async () => {
    mockFetch.mockRejectedValue(new TypeError("fetch failed"));
    const provider = createOllamaProvider("http://ollama.test");

    expect(await provider.healthCheck()).toBe(false);
    expect(mockFetch.mock.calls[0]?.[0]).toBe("http://ollama.test/api/tags");
  });
});
