import { describeError } from './errors';
import { createLogger } from './logger';

export interface PeriodicTaskOptions {
  name: string;
  intervalMs: number;
  maxBackoffMs?: number;
  run: (signal: AbortSignal) => Promise<void>;
  onError?: (error: unknown) => void;
}

/**
 * Re-arms itself with setTimeout after each run, so a slow run never overlaps the next one.
 * Failures double the delay up to maxBackoffMs; the first success resets it.
 */
export class PeriodicTask {
  private timer: ReturnType<typeof setTimeout> | null = null;
  private controller: AbortController | null = null;
  private inFlight: Promise<void> | null = null;
  private failures = 0;
  private readonly log;

  constructor(private readonly options: PeriodicTaskOptions) {
    this.log = createLogger(options.name);
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  get running(): boolean {
    return this.controller !== null;
  }

  start(): void {
    if (this.controller) return;
    this.controller = new AbortController();
    this.schedule(0);
  }

  async stop(): Promise<void> {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.controller?.abort();
    this.controller = null;
    if (this.inFlight) await this.inFlight;
  }

  /** Delay before the next run given the current failure streak. */
  nextDelay(): number {
    if (this.failures === 0) return this.options.intervalMs;
    const maxBackoff = this.options.maxBackoffMs ?? this.options.intervalMs * 8;
    return Math.min(this.options.intervalMs * 2 ** this.failures, Math.max(maxBackoff, this.options.intervalMs));
  }

  private schedule(delay: number) {
    const controller = this.controller;
    if (!controller) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.inFlight = this.tick(controller.signal).finally(() => {
        this.inFlight = null;
        if (this.controller === controller) this.schedule(this.nextDelay());
      });
    }, delay);
  }

  private async tick(signal: AbortSignal): Promise<void> {
    try {
      await this.options.run(signal);
      if (this.failures > 0) this.log.info(`Recovered after ${this.failures} failed run(s)`);
      this.failures = 0;
    } catch (error) {
      if (signal.aborted) return;
      this.failures += 1;
      this.log.warn(`Run failed (${this.failures} in a row), retrying in ${this.nextDelay()}ms: ${describeError(error)}`);
      this.options.onError?.(error);
    }
  }
}
