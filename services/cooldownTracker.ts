import { EscalationPolicy, ProximityEvent, ProximityZone } from '../types';
import { zoneRank } from './proximityClassifier';

export const ALERT_COOLDOWN_MS = 3000;

export const alertKey = (event: Pick<ProximityEvent, 'objectType' | 'direction'>): string =>
  `${event.objectType}:${event.direction}`;

interface CooldownEntry {
  at: number;
  zone: ProximityZone;
}

export interface CooldownOptions {
  windowMs?: number;
  escalation?: EscalationPolicy;
}

/**
 * Remembers when each AlertKey (object type + direction) was last admitted.
 * Only the classifier pipeline writes; diagnostics read through snapshot().
 */
export class CooldownTracker {
  readonly windowMs: number;
  readonly escalation: EscalationPolicy;
  private readonly lastAdmitted = new Map<string, CooldownEntry>();

  constructor(options: CooldownOptions = {}) {
    this.windowMs = options.windowMs ?? ALERT_COOLDOWN_MS;
    this.escalation = options.escalation ?? 'respect-cooldown';
  }

  admit(event: ProximityEvent): boolean {
    const key = alertKey(event);
    const previous = this.lastAdmitted.get(key);

    if (previous) {
      const elapsed = event.timestamp - previous.at;
      const escalated =
        this.escalation === 'bypass-on-escalation' && zoneRank(event.zone) > zoneRank(previous.zone);
      if (elapsed < this.windowMs && !escalated) return false;
    }

    this.lastAdmitted.set(key, { at: event.timestamp, zone: event.zone });
    return true;
  }

  lastAdmittedAt(key: string): number | undefined {
    return this.lastAdmitted.get(key)?.at;
  }

  snapshot(): Array<{ key: string; at: number; zone: ProximityZone }> {
    return [...this.lastAdmitted].map(([key, entry]) => ({ key, ...entry }));
  }

  // Keeps the map bounded; expired keys would be admitted anyway.
  prune(now: number): number {
    let removed = 0;
    for (const [key, entry] of this.lastAdmitted) {
      if (now - entry.at >= this.windowMs) {
        this.lastAdmitted.delete(key);
        removed += 1;
      }
    }
    return removed;
  }
}
