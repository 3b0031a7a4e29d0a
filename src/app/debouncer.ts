/** Trailing-edge debounce: fires once, delayMs after the last trigger. */
export class Debouncer {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly delayMs: number,
    private readonly fire: () => void
  ) {}

  get pending(): boolean {
    return this.timer !== null;
  }

  trigger(): void {
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = setTimeout(() => {
      this.timer = null;
      this.fire();
    }, this.delayMs);
  }

  cancel(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
