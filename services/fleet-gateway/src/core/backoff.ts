export interface BackoffOptions {
  minMs: number;
  maxMs: number;
  factor?: number;
}

/** Exponential delay sequence, capped at `maxMs`. */
export class Backoff {
  private current: number;
  private readonly factor: number;

  constructor(private readonly options: BackoffOptions) {
    this.current = options.minMs;
    this.factor = options.factor ?? 2;
  }

  next(): number {
    const value = this.current;
    this.current = Math.min(this.options.maxMs, Math.max(this.options.minMs, this.current * this.factor));
    return value;
  }

  reset(): void {
    this.current = this.options.minMs;
  }
}
