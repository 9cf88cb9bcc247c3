import { getLogger } from "./logger.js";

const logger = getLogger("fetch");

// ─── HTTP Status Error ─────────────────────────────────────

/**
 * Thrown by fetchJson() for any non-2xx response. Requests are made once;
 * callers decide what a failed status means for the user.
 */
export class HttpStatusError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, statusText: string, url: string) {
    super(`HTTP ${status}: ${statusText}`);
    this.name = "HttpStatusError";
    this.status = status;
    this.url = url;
  }
}

// ─── Options ───────────────────────────────────────────────

export interface FetchWithTimeoutOptions {
  /** Abort the request after this many ms (default: 10000). */
  timeoutMs?: number;
  /** Outer signal, combined with the timeout. */
  signal?: AbortSignal;
}

function shortUrl(url: string | URL): string {
  const urlStr = typeof url === "string" ? url : url.toString();
  return urlStr.length > 80 ? urlStr.substring(0, 80) + "..." : urlStr;
}

// ─── fetchWithTimeout ──────────────────────────────────────

/**
 * Single-attempt fetch bounded by a timeout. Non-2xx responses pass through;
 * a timeout rejects with the runtime's TimeoutError.
 */
export async function fetchWithTimeout(
  url: string | URL,
  init?: RequestInit,
  opts?: FetchWithTimeoutOptions,
): Promise<Response> {
  const timeout = AbortSignal.timeout(opts?.timeoutMs ?? 10_000);
  const signal = opts?.signal ? AbortSignal.any([opts.signal, timeout]) : timeout;

  try {
    return await fetch(url, { ...init, signal });
  } catch (err) {
    logger.warn({ url: shortUrl(url), err }, "Fetch failed");
    throw err;
  }
}

/**
 * fetchWithTimeout() that requires a 2xx and returns the parsed JSON body.
 * The body is `unknown`: validate it before use.
 */
export async function fetchJson(
  url: string | URL,
  init?: RequestInit,
  opts?: FetchWithTimeoutOptions,
): Promise<unknown> {
  const response = await fetchWithTimeout(url, init, opts);
  if (!response.ok) {
    throw new HttpStatusError(response.status, response.statusText, shortUrl(url));
  }
  const body: unknown = await response.json();
  return body;
}
