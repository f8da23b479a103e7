import type { RequestHandler } from 'express';

const WINDOW_MS = 60_000;

/**
 * Per-key sliding window: at most `limit` hits in any 60 s span. Rejected
 * hits are not recorded. Keys with no hit left in the window are swept at
 * most once per window.
 */
export class SlidingWindowLimiter {
  private readonly buckets = new Map<string, number[]>();
  private lastSweep = Number.NEGATIVE_INFINITY;

  constructor(
    private readonly limit: number,
    private readonly now: () => number = Date.now,
  ) {}

  get enabled(): boolean {
    return this.limit > 0;
  }

  /** Number of keys currently holding a window. */
  get trackedKeys(): number {
    return this.buckets.size;
  }

  hit(key: string): boolean {
    if (!this.enabled) return true;

    const now = this.now();
    if (now - this.lastSweep >= WINDOW_MS) this.sweep(now);

    const bucket = (this.buckets.get(key) ?? []).filter(ts => now - ts <= WINDOW_MS);
    if (bucket.length >= this.limit) {
      this.buckets.set(key, bucket);
      return false;
    }
    bucket.push(now);
    this.buckets.set(key, bucket);
    return true;
  }

  private sweep(now: number): void {
    for (const [key, bucket] of this.buckets) {
      if (!bucket.some(ts => now - ts <= WINDOW_MS)) this.buckets.delete(key);
    }
    this.lastSweep = now;
  }
}

export function rateLimit(limiter: SlidingWindowLimiter): RequestHandler {
  return (req, res, next) => {
    if (req.method === 'OPTIONS' || !limiter.enabled) return next();

    const clientIp = req.ip ?? 'unknown';
    if (!limiter.hit(clientIp)) {
      console.warn(`[API] rate limit exceeded for ${clientIp}`);
      return res.status(429).json({ success: false, error: 'Too Many Requests', timestamp: new Date().toISOString() });
    }
    next();
  };
}
