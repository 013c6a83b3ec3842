import { Alert } from '../types';
import { AlertAggregator } from './alertAggregator';
import { AudioService } from './audioService';
import { isAbortError } from './errors';
import { createLogger } from './logger';

const log = createLogger('Announcer');

/**
 * The only consumer of the aggregator. Pulls one alert at a time, and only when
 * the speaker is free, so anything still queued can be overtaken by a more
 * urgent arrival.
 */
export class Announcer {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private last: Alert | null = null;
  private spoken = 0;

  constructor(
    private readonly aggregator: AlertAggregator,
    private readonly audio: AudioService
  ) {}

  get lastAnnouncement(): Alert | null {
    return this.last;
  }

  get announcedCount(): number {
    return this.spoken;
  }

  get running(): boolean {
    return this.loop !== null;
  }

  start(): void {
    if (this.loop) return;
    this.controller = new AbortController();
    this.loop = this.run(this.controller.signal);
  }

  /** Aborts the pending wait; an utterance already in progress finishes first. */
  async stop(): Promise<void> {
    this.controller?.abort();
    const loop = this.loop;
    this.loop = null;
    this.controller = null;
    if (loop) await loop;
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      // Take an alert only once the speaker is free.
      await this.audio.whenIdle(signal);
      if (signal.aborted) break;

      let alert: Alert;
      try {
        alert = await this.aggregator.next(signal);
      } catch (error) {
        if (isAbortError(error)) break;
        log.error('Failed to read next alert', error);
        continue;
      }

      // A priority reply may have started while we waited, or quit was requested.
      if (signal.aborted || !this.audio.idle) {
        this.aggregator.putBack(alert);
        continue;
      }

      log.info(`Speaking: ${alert.message}`);
      await this.audio.speak(alert.message);
      this.last = alert;
      this.spoken += 1;
    }
    log.debug('Announcer stopped');
  }
}
