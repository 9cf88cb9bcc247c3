import { getLogger, type Config } from "@coinsage/core";
import { BinanceMarketClient } from "@coinsage/market";
import {
  createLLMProvider,
  createPremiumProviderFactory,
  IntentClassifier,
  IntentDispatcher,
  LLMAnalysisProvider,
} from "@coinsage/agent";
import {
  ChannelRegistry,
  ConsoleAdapter,
  TelegramAdapter,
  type GatewayDeps,
} from "@coinsage/gateway";

const logger = getLogger("app");

export interface AppOptions {
  /** Fired when the console REPL exits. */
  onConsoleQuit?: () => void;
}

/** The REPL runs when asked for, or when there is no Telegram bot to talk to. */
export function consoleChannelEnabled(config: Config): boolean {
  return config.consoleEnabled || !config.telegramBotToken;
}

export interface App {
  deps: GatewayDeps;
  channels: ChannelRegistry;
}

/**
 * Builds every long-lived component from config. Nothing here touches the
 * network; adapters connect in `channels.startAll`.
 */
export function buildApp(config: Config, options: AppOptions = {}): App {
  const intentLlm = createLLMProvider(config, config.intentProvider);
  const analysisLlm = createLLMProvider(config, config.analysisProvider);
  logger.info(
    {
      intent: `${intentLlm.name} (${intentLlm.model})`,
      analysis: `${analysisLlm.name} (${analysisLlm.model})`,
    },
    "LLM backends configured",
  );

  const market = new BinanceMarketClient({ baseUrl: config.binanceBaseUrl });

  const dispatcher = new IntentDispatcher({
    classifier: new IntentClassifier(intentLlm),
    services: {
      market,
      analysis: new LLMAnalysisProvider(analysisLlm, config.defaultTradeAmount),
      premium: createPremiumProviderFactory(config),
      settings: {
        priceAnalysisDays: config.priceAnalysisDays,
        testnet: config.binanceTestnet,
      },
    },
  });

  const deps: GatewayDeps = {
    dispatcher,
    market,
    backends: { intent: intentLlm, analysis: analysisLlm },
    settings: {
      enableTrading: config.enableTrading,
      showDebugInfo: config.showDebugInfo,
      authorizedChatId: config.telegramChatId,
      testnet: config.binanceTestnet,
    },
  };

  const channels = new ChannelRegistry();
  if (config.telegramBotToken) {
    channels.register(new TelegramAdapter(config.telegramBotToken));
  }
  if (consoleChannelEnabled(config)) {
    channels.register(new ConsoleAdapter({ onQuit: options.onConsoleQuit }));
  }

  return { deps, channels };
}
