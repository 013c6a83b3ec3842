import { Alert, ProximityZone } from '../types';
import { AbortedError } from './errors';
import { createLogger } from './logger';

const log = createLogger('Aggregator');

export const DEFAULT_QUEUE_CAPACITY = 32;
export const DEFAULT_STALE_AFTER_MS = 10_000;

// Lower rank is spoken first. Far never reaches the queue.
export function alertRank(alert: Alert): number {
  if (alert.kind === 'safety') return 0;
  switch (alert.event.zone) {
    case ProximityZone.CRITICAL:
      return 1;
    case ProximityZone.WARNING:
      return 2;
    case ProximityZone.FAR:
      return 3;
  }
}

export const isAnnounceable = (alert: Alert): boolean => alertRank(alert) < 3;

interface QueuedAlert {
  alert: Alert;
  rank: number;
  sequence: number;
}

interface Waiter {
  resolve: (alert: Alert) => void;
  reject: (error: Error) => void;
  cleanup: () => void;
}

export interface AggregatorOptions {
  capacity?: number;
  staleAfterMs?: number; // 0 disables expiry
  now?: () => number;
}

export type AlertListener = (alert: Alert) => void;

/**
 * Single severity-ordered stream between the producers and the announcer.
 * publish() never blocks; next() waits for the most urgent queued alert.
 */
export class AlertAggregator {
  private readonly queue: QueuedAlert[] = [];
  private readonly waiters: Waiter[] = [];
  private readonly listeners = new Set<AlertListener>();
  private readonly capacity: number;
  private readonly staleAfterMs: number;
  private readonly now: () => number;
  private sequence = 0;
  private closed = false;

  constructor(options: AggregatorOptions = {}) {
    this.capacity = options.capacity ?? DEFAULT_QUEUE_CAPACITY;
    this.staleAfterMs = options.staleAfterMs ?? DEFAULT_STALE_AFTER_MS;
    this.now = options.now ?? Date.now;
  }

  subscribe(listener: AlertListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Returns true when the alert was queued (or handed straight to a waiting announcer). */
  publish(alert: Alert): boolean {
    if (this.closed) return false;

    for (const listener of this.listeners) {
      try {
        listener(alert);
      } catch (error) {
        log.error('Alert listener failed', error);
      }
    }

    if (!isAnnounceable(alert)) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.cleanup();
      waiter.resolve(alert);
      return true;
    }

    const entry: QueuedAlert = { alert, rank: alertRank(alert), sequence: this.sequence++ };
    const index = this.queue.findIndex((queued) => queued.rank > entry.rank);
    if (index === -1) this.queue.push(entry);
    else this.queue.splice(index, 0, entry);

    return this.enforceCapacity(entry);
  }

  next(signal?: AbortSignal): Promise<Alert> {
    if (signal?.aborted || this.closed) return Promise.reject(new AbortedError());

    const ready = this.take();
    if (ready) return Promise.resolve(ready);

    return new Promise<Alert>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) this.waiters.splice(index, 1);
        reject(new AbortedError());
      };
      const waiter: Waiter = {
        resolve,
        reject,
        cleanup: () => signal?.removeEventListener('abort', onAbort)
      };
      signal?.addEventListener('abort', onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  /** Returns an alert the consumer took but could not speak to the head of its severity class. */
  putBack(alert: Alert): void {
    if (this.closed) return;
    const rank = alertRank(alert);
    const entry: QueuedAlert = { alert, rank, sequence: -1 };
    const index = this.queue.findIndex((queued) => queued.rank >= rank);
    if (index === -1) this.queue.push(entry);
    else this.queue.splice(index, 0, entry);
  }

  pending(): Alert[] {
    return this.queue.map((entry) => entry.alert);
  }

  get size(): number {
    return this.queue.length;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.cleanup();
      waiter.reject(new AbortedError('Aggregator closed'));
    }
  }

  private take(): Alert | null {
    const now = this.now();
    while (this.queue.length > 0) {
      const entry = this.queue.shift();
      if (!entry) break;
      if (this.isStale(entry.alert, now)) {
        log.debug(`Dropping stale alert: ${entry.alert.message}`);
        continue;
      }
      return entry.alert;
    }
    return null;
  }

  private isStale(alert: Alert, now: number): boolean {
    return alert.kind === 'proximity' && this.staleAfterMs > 0 && now - alert.createdAt > this.staleAfterMs;
  }

  // Only the proximity backlog is bounded; safety alerts are always kept.
  private enforceCapacity(added: QueuedAlert): boolean {
    let proximityCount = 0;
    let victim = -1;
    this.queue.forEach((entry, index) => {
      if (entry.alert.kind === 'proximity') {
        proximityCount += 1;
        victim = index; // queue is ordered, so the last proximity entry is the least urgent and newest
      }
    });
    if (proximityCount <= this.capacity || victim === -1) return true;

    const [dropped] = this.queue.splice(victim, 1);
    log.warn(`Alert queue full, dropping: ${dropped.alert.message}`);
    return dropped !== added;
  }
}
