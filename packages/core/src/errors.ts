import { getLogger } from "./logger.js";

const logger = getLogger("errors");

// ─── Error Types ────────────────────────────────────────────

/**
 * Raised when a backend is selected but its credentials are absent.
 * Carries a code so classifyError() puts it in the "config" bucket.
 */
export class ProviderConfigError extends Error {
  readonly code = "MISSING_API_KEY";

  constructor(message: string) {
    super(message);
    this.name = "ProviderConfigError";
  }
}

// ─── Error Classification ───────────────────────────────────

export type ErrorCategory = "fatal" | "config" | "transient" | "abort" | "unknown";

const FATAL_CODES = new Set([
  "ERR_OUT_OF_MEMORY",
  "ERR_WORKER_OUT_OF_MEMORY",
  "ERR_WORKER_UNCAUGHT_EXCEPTION",
]);

const CONFIG_CODES = new Set(["INVALID_CONFIG", "MISSING_API_KEY"]);

const TRANSIENT_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ENOTFOUND",
  "ETIMEDOUT",
  "ECONNABORTED",
  "EPIPE",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "EAI_AGAIN",
  // undici (global fetch)
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_CONNECT",
  "UND_ERR_SOCKET",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

function extractErrorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err) {
    const { code } = err;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

function findInCauseChain(
  err: unknown,
  predicate: (code: string) => boolean,
  depth = 0,
): boolean {
  if (depth > 10) return false;

  const code = extractErrorCode(err);
  if (code && predicate(code)) return true;

  if (err && typeof err === "object" && "cause" in err) {
    return findInCauseChain(err.cause, predicate, depth + 1);
  }

  return false;
}

/**
 * True for cancellations, including the TimeoutError raised by AbortSignal.timeout().
 */
export function isAbortError(err: unknown): boolean {
  if (err && typeof err === "object" && "name" in err) {
    return err.name === "AbortError" || err.name === "TimeoutError";
  }
  return false;
}

export function isTransientNetworkError(err: unknown): boolean {
  if (findInCauseChain(err, (code) => TRANSIENT_CODES.has(code))) return true;

  // undici reports connection failures as TypeError("fetch failed") with the errno on .cause
  if (err instanceof TypeError && err.message === "fetch failed" && err.cause) {
    return isTransientNetworkError(err.cause);
  }

  if (err instanceof AggregateError) {
    return err.errors.some((e) => isTransientNetworkError(e));
  }

  return false;
}

export function classifyError(err: unknown): ErrorCategory {
  if (isAbortError(err)) return "abort";
  if (findInCauseChain(err, (code) => FATAL_CODES.has(code))) return "fatal";
  if (findInCauseChain(err, (code) => CONFIG_CODES.has(code))) return "config";
  if (isTransientNetworkError(err)) return "transient";
  return "unknown";
}

/** Message text of anything thrown. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === "string" ? err : "Unknown error";
}

// ─── Process-level Handler ──────────────────────────────────

/**
 * Request failures are handled inside the dispatcher, so a rejection that
 * reaches the process is either a stray network blip (keep running) or a bug
 * in wiring (exit so a supervisor restarts us).
 */
export function installUnhandledRejectionHandler(): void {
  process.on("unhandledRejection", (reason: unknown) => {
    const category = classifyError(reason);

    switch (category) {
      case "transient":
        logger.warn({ err: reason }, "Transient network error (unhandled rejection), continuing");
        break;

      case "abort":
        logger.debug({ err: reason }, "Abort error (unhandled rejection)");
        break;

      case "fatal":
      case "config":
        logger.error({ err: reason, category }, "Unrecoverable error, exiting");
        process.exit(1);
        break;

      default:
        logger.error({ err: reason }, "Unhandled rejection (unknown category), exiting");
        process.exit(1);
    }
  });
}
