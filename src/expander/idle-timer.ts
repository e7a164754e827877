/**
 * Fires `onIdle` once no input has been seen for `timeoutSeconds`.
 *
 * A timeout of zero or less disables the timer. The pending timeout is unref'd so an idle session
 * never keeps the process alive.
 */
export class IdleResetTimer {
  private handle: NodeJS.Timeout | null = null;

  constructor(
    private readonly timeoutSeconds: number,
    private readonly onIdle: () => void
  ) {}

  get enabled(): boolean {
    return Number.isFinite(this.timeoutSeconds) && this.timeoutSeconds > 0;
  }

  get pending(): boolean {
    return this.handle !== null;
  }

  /** Restarts the countdown. */
  touch(): void {
    this.cancel();
    if (!this.enabled) {
      return;
    }
    this.handle = setTimeout(() => {
      this.handle = null;
      this.onIdle();
    }, this.timeoutSeconds * 1000);
    this.handle.unref();
  }

  cancel(): void {
    if (this.handle !== null) {
      clearTimeout(this.handle);
      this.handle = null;
    }
  }
}
