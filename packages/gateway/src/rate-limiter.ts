/**
 * In-memory sliding-window limiter keyed by sender. Each model-backed
 * message costs real LLM calls, so bursts are cut off per sender.
 */
export class RateLimiter {
  private hits = new Map<string, number[]>();

  constructor(
    private limit: number = 10,
    private windowMs: number = 60_000,
  ) {}

  private recent(key: string, now: number): number[] {
    const kept = (this.hits.get(key) ?? []).filter((t) => now - t < this.windowMs);
    if (kept.length === 0) this.hits.delete(key);
    else this.hits.set(key, kept);
    return kept;
  }

  /** Records one message and reports whether it exceeds the limit. */
  isLimited(key: string): boolean {
    const now = Date.now();
    const kept = this.recent(key, now);
    kept.push(now);
    this.hits.set(key, kept);
    return kept.length > this.limit;
  }

  /** Milliseconds until the next message would be accepted; 0 when it would be now. */
  retryAfterMs(key: string): number {
    const now = Date.now();
    const kept = this.recent(key, now);
    const pivot = kept[kept.length - this.limit];
    if (kept.length < this.limit || pivot === undefined) return 0;
    return Math.max(0, this.windowMs - (now - pivot));
  }
}
