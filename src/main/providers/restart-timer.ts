/**
 * Restart-on-activity debounce: every `restart()` pushes the deadline out by
 * `delayMs`, so a burst of triggers collapses into one callback.
 */
export class RestartTimer {
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    private readonly delayMs: number,
    private readonly callback: () => Promise<unknown> | void,
    private readonly label = 'timer'
  ) {}

  restart(): void {
    this.cancel();
    this.timer = setTimeout(() => {
      this.timer = null;
      this.fire();
    }, this.delayMs);
  }

  cancel(): void {
    if (!this.timer) return;
    clearTimeout(this.timer);
    this.timer = null;
  }

  get pending(): boolean {
    return this.timer !== null;
  }

  private fire(): void {
    try {
      const result = this.callback();
      if (result instanceof Promise) {
        result.catch((e: unknown) => {
          console.error(`Failed to run debounced ${this.label}:`, e);
        });
      }
    } catch (e) {
      console.error(`Failed to run debounced ${this.label}:`, e);
    }
  }
}
