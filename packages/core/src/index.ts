export {
  loadConfig,
  resetConfig,
  configSchema,
  llmProviderNames,
  type Config,
  type LLMProviderName,
} from "./config.js";
export {
  createLogger,
  getLogger,
  type Logger,
  type LoggerSettings,
  type LogDestination,
} from "./logger.js";
export {
  isAbortError,
  isTransientNetworkError,
  classifyError,
  errorMessage,
  installUnhandledRejectionHandler,
  ProviderConfigError,
  type ErrorCategory,
} from "./errors.js";
export {
  fetchWithTimeout,
  fetchJson,
  HttpStatusError,
  type FetchWithTimeoutOptions,
} from "./fetch.js";
export type {
  Platform,
  OutgoingMessage,
  ReplyButton,
} from "./types.js";
