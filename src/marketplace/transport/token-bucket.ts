export interface TokenBucketOptions {
  capacity: number;
  refillPerMinute: number;
}

/** Request budget for one endpoint template. */
export class TokenBucket {
  private tokens: number;
  private lastRefillAt: number;

  constructor(
    private readonly options: TokenBucketOptions,
    private readonly now: () => number,
  ) {
    this.tokens = options.capacity;
    this.lastRefillAt = now();
  }

  /** Takes a token and returns 0, or returns how long to wait before one is available. */
  take(): number {
    this.refill();
    if (this.tokens >= 1) {
      this.tokens -= 1;
      return 0;
    }
    return Math.ceil(((1 - this.tokens) * 60_000) / this.options.refillPerMinute);
  }

  available() {
    this.refill();
    return Math.floor(this.tokens);
  }

  private refill() {
    const current = this.now();
    const elapsed = current - this.lastRefillAt;
    if (elapsed <= 0) return;
    const added = (elapsed * this.options.refillPerMinute) / 60_000;
    this.tokens = Math.min(this.options.capacity, this.tokens + added);
    this.lastRefillAt = current;
  }
}

export class TokenBucketRegistry {
  private readonly buckets = new Map<string, TokenBucket>();

  constructor(
    private readonly options: TokenBucketOptions,
    private readonly now: () => number,
  ) {}

  get(endpoint: string): TokenBucket {
    let bucket = this.buckets.get(endpoint);
    if (!bucket) {
      bucket = new TokenBucket(this.options, this.now);
      this.buckets.set(endpoint, bucket);
    }
    return bucket;
  }
}
