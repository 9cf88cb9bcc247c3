import {
  loadConfig,
  createLogger,
  getLogger,
  installUnhandledRejectionHandler,
} from "@coinsage/core";
import { buildApp, consoleChannelEnabled } from "./app.js";
import { runShutdown } from "./shutdown.js";

const SHUTDOWN_TIMEOUT_MS = 15_000;
const STEP_TIMEOUT_MS = 5_000;

async function main(): Promise<void> {
  // ─── Load config ──────────────────────────────────────────
  const config = loadConfig();
  createLogger({
    level: config.logLevel,
    destination: consoleChannelEnabled(config) ? "stderr" : "stdout",
  });
  const logger = getLogger("server");

  logger.info("Starting CoinSage...");

  // ─── Process safety ────────────────────────────────────────
  installUnhandledRejectionHandler();

  // ─── Graceful shutdown ────────────────────────────────────
  let isShuttingDown = false;

  const shutdown = async (reason: string): Promise<void> => {
    if (isShuttingDown) {
      logger.warn("Shutdown already in progress, ignoring duplicate signal");
      return;
    }
    isShuttingDown = true;
    logger.info({ reason }, "Shutting down...");

    const forceTimer = setTimeout(() => {
      logger.error("Shutdown timed out, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceTimer.unref();

    await runShutdown([{ label: "Stop channels", run: () => app.channels.stopAll() }], STEP_TIMEOUT_MS);

    clearTimeout(forceTimer);
    process.exit(0);
  };

  const onShutdownError = (err: unknown) => {
    logger.error({ err }, "Shutdown failed");
    process.exit(1);
  };

  // ─── Wire components and start channels ───────────────────
  const app = buildApp(config, {
    onConsoleQuit: () => {
      shutdown("console quit").catch(onShutdownError);
    },
  });

  const started = await app.channels.startAll(app.deps);
  if (started.length === 0) {
    throw new Error("No channel could be started. Check TELEGRAM_BOT_TOKEN or set CONSOLE_ENABLED=true");
  }

  process.on("SIGINT", () => {
    shutdown("SIGINT").catch(onShutdownError);
  });
  process.on("SIGTERM", () => {
    shutdown("SIGTERM").catch(onShutdownError);
  });

  logger.info(
    {
      channels: started,
      trading: config.enableTrading ? "simulated" : "disabled",
      network: config.binanceTestnet ? "testnet" : "mainnet",
    },
    "CoinSage is running",
  );
}

main().catch((err: unknown) => {
  getLogger("server").fatal({ err }, "Fatal error during startup");
  process.exit(1);
});
