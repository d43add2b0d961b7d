/**
 * A short-lived, client-asserted value shown before the OS confirms it.
 * Reads past the TTL discard the value; an authoritative update should call
 * `clear()`.
 */
export class OptimisticState<T> {
  private entry: { value: T; setAt: number } | null = null;

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  set(value: T): void {
    this.entry = { value, setAt: this.now() };
  }

  /** The asserted value, or undefined when none is set or it has expired. */
  get(): T | undefined {
    if (!this.entry) return undefined;
    if (this.now() - this.entry.setAt > this.ttlMs) {
      this.entry = null;
      return undefined;
    }
    return this.entry.value;
  }

  clear(): void {
    this.entry = null;
  }
}
