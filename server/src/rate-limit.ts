interface Bucket {
  tokens: number;
  updatedAt: number;
}

/** Per-key token bucket, applied at the HTTP boundary before the arena */
export class TokenBucketLimiter {
  private buckets: Map<string, Bucket> = new Map();

  constructor(
    readonly capacity: number,
    readonly refillPerSec: number,
    private readonly clock: () => number = Date.now
  ) {}

  private refill(key: string, now: number): Bucket {
    const bucket = this.buckets.get(key);
    if (!bucket) {
      const fresh = { tokens: this.capacity, updatedAt: now };
      this.buckets.set(key, fresh);
      return fresh;
    }
    const elapsedSec = Math.max(0, now - bucket.updatedAt) / 1000;
    bucket.tokens = Math.min(this.capacity, bucket.tokens + elapsedSec * this.refillPerSec);
    bucket.updatedAt = now;
    return bucket;
  }

  /** Spend one token for `key`; false when the bucket is empty */
  take(key: string): boolean {
    const bucket = this.refill(key, this.clock());
    if (bucket.tokens < 1) return false;
    bucket.tokens -= 1;
    return true;
  }

  /** Milliseconds until `key` has a whole token again */
  retryAfterMs(key: string): number {
    const bucket = this.refill(key, this.clock());
    if (bucket.tokens >= 1 || this.refillPerSec <= 0) return 0;
    return Math.ceil(((1 - bucket.tokens) / this.refillPerSec) * 1000);
  }

  /** Drop buckets that have refilled completely */
  prune(): void {
    const now = this.clock();
    for (const key of Array.from(this.buckets.keys())) {
      if (this.refill(key, now).tokens >= this.capacity) this.buckets.delete(key);
    }
  }

  get size(): number {
    return this.buckets.size;
  }
}
