export type StatusListener<T> = (value: T, previous: T) => void;

/**
 * Holds one value and tells subscribers when it changes. Setting the
 * current value again is a no-op.
 */
export class StatusCell<T> {
  private value: T;
  private readonly listeners = new Set<StatusListener<T>>();

  constructor(initial: T) {
    this.value = initial;
  }

  get(): T {
    return this.value;
  }

  set(next: T): void {
    if (Object.is(next, this.value)) return;
    const previous = this.value;
    this.value = next;
    for (const listener of [...this.listeners]) {
      listener(next, previous);
    }
  }

  subscribe(listener: StatusListener<T>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
