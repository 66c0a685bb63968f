export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
  /** 0 or Infinity means unbounded */
  maxAttempts?: number;
}

/**
 * Reconnection delay policy: base, doubling, capped (1s → 2s → 4s … → 60s).
 */
export class ExponentialBackoff {
  private attempt = 0;

  constructor(private readonly options: BackoffOptions) {
    if (options.baseDelayMs <= 0 || options.maxDelayMs < options.baseDelayMs) {
      throw new Error('Backoff requires 0 < baseDelayMs <= maxDelayMs');
    }
  }

  get attempts(): number {
    return this.attempt;
  }

  get exhausted(): boolean {
    const max = this.options.maxAttempts ?? 0;
    return max > 0 && Number.isFinite(max) && this.attempt >= max;
  }

  /**
   * Delay before the next attempt; advances the attempt counter.
   */
  next(): number {
    this.attempt++;
    const exponent = Math.min(this.attempt - 1, 30);
    return Math.min(this.options.baseDelayMs * 2 ** exponent, this.options.maxDelayMs);
  }

  reset(): void {
    this.attempt = 0;
  }
}
