/**
 * Price source unreachable, non-2xx, or returned a body we could not read.
 * The underlying failure (HttpStatusError, TypeError, ZodError) is kept on `cause`.
 */
export class MarketDataError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MarketDataError";
  }
}
