type Waiter = { resolve: () => void; reject: (reason: Error) => void };

/**
 * Set-once signal. Opening it releases every pending waiter; it never closes again.
 */
export class ReadinessGate {
  private ready = false;
  private cancelled: Error | null = null;
  private waiters: Waiter[] = [];

  isReady(): boolean {
    return this.ready;
  }

  wait(): Promise<void> {
    if (this.ready) return Promise.resolve();
    if (this.cancelled) return Promise.reject(this.cancelled);
    return new Promise<void>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  open(): void {
    if (this.ready || this.cancelled) return;
    this.ready = true;
    const waiters = this.waiters;
    this.waiters = [];
    for (const w of waiters) w.resolve();
  }

  /**
   * Rejects pending and future waiters with `reason`. No effect once open.
   */
  cancel(reason: Error): void {
    if (this.ready || this.cancelled) return;
    this.cancelled = reason;
    const waiters = this.waiters;
    this.waiters = [];
    for (const w of waiters) w.reject(reason);
  }
}
