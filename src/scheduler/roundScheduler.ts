import { Logger } from '../logging/logger';

export type RoundTask = (signal: AbortSignal) => Promise<void>;

export interface RoundSchedulerOptions {
  intervalMs: number;
  clock: () => number;
  logger: Logger;
}

/**
 * Runs `task` once right away and then once per interval until stopped.
 *
 * The next timer is only armed after the current round settles, so rounds
 * never overlap. A round that overruns the interval is followed immediately
 * by the next one.
 */
export class RoundScheduler {
  private readonly controller = new AbortController();
  private timer: ReturnType<typeof setTimeout> | null = null;
  private inFlight: Promise<void> | null = null;
  private started = false;
  private rounds = 0;

  constructor(private readonly task: RoundTask, private readonly opts: RoundSchedulerOptions) {}

  get stopped(): boolean {
    return this.controller.signal.aborted;
  }

  get roundCount(): number {
    return this.rounds;
  }

  start(): void {
    if (this.started || this.stopped) return;
    this.started = true;
    this._tick();
  }

  /**
   * Cancels the in-flight round and prevents any further ticks. Safe to call repeatedly.
   */
  stop(): void {
    if (this.stopped) return;
    this.controller.abort();
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  /** Resolves once no round is running. */
  idle(): Promise<void> {
    return this.inFlight ?? Promise.resolve();
  }

  private _tick(): void {
    this.timer = null;
    if (this.stopped) return;
    const { signal } = this.controller;
    const startedAt = this.opts.clock();
    this.rounds++;
    this.opts.logger.log('debug', 'Starting measurement round', { round: this.rounds });

    this.inFlight = this.task(signal)
      .catch((err: unknown) => {
        this.opts.logger.log('error', 'Measurement round failed', { round: this.rounds, error: String(err) });
      })
      .then(() => {
        this.inFlight = null;
        if (this.stopped) return;
        const elapsed = this.opts.clock() - startedAt;
        this.timer = setTimeout(() => this._tick(), Math.max(0, this.opts.intervalMs - elapsed));
      });
  }
}
