export interface RecordedError {
  at: string;
  message: string;
  meta?: unknown;
}

export class ErrorBuffer {
  private readonly errors: RecordedError[] = [];

  constructor(
    private readonly limit = 20,
    private readonly now: () => Date = () => new Date()
  ) {}

  push(message: string, meta?: unknown): void {
    this.errors.unshift({ at: this.now().toISOString(), message, meta });
    if (this.errors.length > this.limit) {
      this.errors.length = this.limit;
    }
  }

  /** Newest first. */
  list(): RecordedError[] {
    return [...this.errors];
  }
}
