import { z } from "zod";
import { config as loadDotenv } from "dotenv";
import { resolve } from "node:path";

loadDotenv({ path: resolve(process.cwd(), ".env") });

export const llmProviderNames = ["ollama", "openai", "gemini", "anthropic"] as const;

const llmProviderSchema = z.enum(llmProviderNames);

export const configSchema = z.object({
  // Telegram
  telegramBotToken: z.string().optional(),
  telegramChatId: z.string().optional(),

  // Console REPL
  consoleEnabled: z.boolean().default(false),

  // LLM backends (intent classification and analysis can differ)
  intentProvider: llmProviderSchema.default("ollama"),
  analysisProvider: llmProviderSchema.default("ollama"),
  ollamaBaseUrl: z.string().url().default("http://localhost:11434"),
  ollamaModel: z.string().default("llama3.2-vision:11b"),
  openaiApiKey: z.string().optional(),
  openaiModel: z.string().default("gpt-4o-mini"),
  geminiApiKey: z.string().optional(),
  geminiModel: z.string().default("gemini-2.0-flash"),
  anthropicApiKey: z.string().optional(),
  anthropicModel: z.string().optional(),

  // Sampling
  llmTimeoutMs: z.number().int().positive().default(60_000),
  llmTemperature: z.number().min(0).max(2).default(0.3),
  llmMaxTokens: z.number().int().positive().default(1000),

  // Market data
  binanceBaseUrl: z.string().url().default("https://api.binance.com"),
  binanceTestnet: z.boolean().default(true),

  // Trading (always simulated)
  defaultTradeAmount: z.number().positive().default(0.001),
  priceAnalysisDays: z.number().int().min(1).max(1000).default(15),
  enableTrading: z.boolean().default(false),

  // Presentation
  showDebugInfo: z.boolean().default(true),

  // Logging
  logLevel: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export type Config = z.infer<typeof configSchema>;
export type LLMProviderName = z.infer<typeof llmProviderSchema>;

let cachedConfig: Config | null = null;

/** Unset, empty and `your_...` placeholder values all count as missing. */
function secret(value: string | undefined): string | undefined {
  if (!value || value.startsWith("your_")) return undefined;
  return value;
}

function numeric(value: string | undefined): number | undefined {
  return value ? Number(value) : undefined;
}

function flag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === "") return fallback;
  return value.toLowerCase() === "true";
}

export function loadConfig(): Config {
  if (cachedConfig) return cachedConfig;

  const env = process.env;
  const result = configSchema.safeParse({
    telegramBotToken: secret(env.TELEGRAM_BOT_TOKEN),
    telegramChatId: secret(env.TELEGRAM_CHAT_ID),
    consoleEnabled: flag(env.CONSOLE_ENABLED, false),
    intentProvider: env.INTENT_AI_PROVIDER || env.AI_PROVIDER || undefined,
    analysisProvider: env.ANALYSIS_AI_PROVIDER || undefined,
    ollamaBaseUrl: env.OLLAMA_BASE_URL || undefined,
    ollamaModel: env.OLLAMA_MODEL || undefined,
    openaiApiKey: secret(env.OPENAI_API_KEY),
    openaiModel: env.OPENAI_MODEL || undefined,
    geminiApiKey: secret(env.GEMINI_API_KEY),
    geminiModel: env.GEMINI_MODEL || undefined,
    anthropicApiKey: secret(env.ANTHROPIC_API_KEY),
    anthropicModel: env.ANTHROPIC_MODEL || undefined,
    llmTimeoutMs: numeric(env.LLM_TIMEOUT_MS),
    llmTemperature: numeric(env.LLM_TEMPERATURE),
    llmMaxTokens: numeric(env.LLM_MAX_TOKENS),
    binanceBaseUrl: env.BINANCE_BASE_URL || undefined,
    binanceTestnet: flag(env.BINANCE_TESTNET, true),
    defaultTradeAmount: numeric(env.DEFAULT_TRADE_AMOUNT),
    priceAnalysisDays: numeric(env.PRICE_ANALYSIS_DAYS),
    enableTrading: flag(env.ENABLE_TRADING, false),
    showDebugInfo: flag(env.SHOW_DEBUG_INFO, true),
    logLevel: env.LOG_LEVEL || undefined,
  });

  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `  ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid configuration:\n${errors}`);
  }

  cachedConfig = result.data;
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
