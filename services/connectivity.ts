import { ConnectivityEntry, ConnectivitySource } from '../types';
import { createLogger } from './logger';

const log = createLogger('Connectivity');

const SOURCES: ConnectivitySource[] = ['fall', 'emergency', 'assistance', 'environmental', 'video'];

// Degraded-status flags for the dashboard. Poll failures land here, never in safety state.
export class ConnectivityMonitor {
  private readonly entries = new Map<ConnectivitySource, ConnectivityEntry>();

  constructor(private readonly now: () => number = Date.now) {
    for (const source of SOURCES) {
      this.entries.set(source, { status: 'unknown', lastSuccess: null, lastFailure: null, lastError: null });
    }
  }

  markOnline(source: ConnectivitySource): void {
    const entry = this.entry(source);
    if (entry.status === 'degraded') log.info(`${source} source reachable again`);
    this.entries.set(source, { ...entry, status: 'online', lastSuccess: this.now(), lastError: null });
  }

  markDegraded(source: ConnectivitySource, reason: string): void {
    const entry = this.entry(source);
    if (entry.status !== 'degraded') log.warn(`${source} source degraded: ${reason}`);
    this.entries.set(source, { ...entry, status: 'degraded', lastFailure: this.now(), lastError: reason });
  }

  get(source: ConnectivitySource): ConnectivityEntry {
    return { ...this.entry(source) };
  }

  isDegraded(): boolean {
    return [...this.entries.values()].some((entry) => entry.status === 'degraded');
  }

  snapshot(): Record<ConnectivitySource, ConnectivityEntry> {
    return {
      fall: this.get('fall'),
      emergency: this.get('emergency'),
      assistance: this.get('assistance'),
      environmental: this.get('environmental'),
      video: this.get('video')
    };
  }

  private entry(source: ConnectivitySource): ConnectivityEntry {
    return this.entries.get(source) ?? { status: 'unknown', lastSuccess: null, lastFailure: null, lastError: null };
  }
}
