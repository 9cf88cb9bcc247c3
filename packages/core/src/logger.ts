import pino from "pino";

export type Logger = pino.Logger;

export type LogDestination = "stdout" | "stderr";

export interface LoggerSettings {
  level?: string;
  /** Use stderr while the console REPL owns stdout. */
  destination?: LogDestination;
}

let rootLogger: Logger | null = null;
let destination: LogDestination = "stdout";
const components = new Set<Logger>();

// Resolved per line so createLogger() can redirect loggers that already exist
const output: pino.DestinationStream = {
  write(line: string) {
    (destination === "stderr" ? process.stderr : process.stdout).write(line);
  },
};

/**
 * Creates the root logger, or reconfigures it when modules already took
 * their component loggers at import time.
 */
export function createLogger(settings: LoggerSettings = {}): Logger {
  if (settings.destination) destination = settings.destination;

  if (rootLogger) {
    if (settings.level) {
      rootLogger.level = settings.level;
      for (const logger of components) logger.level = settings.level;
    }
    return rootLogger;
  }

  rootLogger = pino(
    {
      level: settings.level ?? process.env.LOG_LEVEL ?? "info",
      formatters: {
        level(label) {
          return { level: label };
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    output,
  );

  return rootLogger;
}

export function getLogger(name: string): Logger {
  const parent = rootLogger ?? createLogger();
  const logger = parent.child({ component: name });
  components.add(logger);
  return logger;
}
