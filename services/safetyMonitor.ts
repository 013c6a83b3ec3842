import {
  AssistanceSubtype,
  SafetyEvent,
  SafetyEventType,
  SafetyState,
  SafetyTransition
} from '../types';
import { createLogger } from './logger';

const log = createLogger('SafetyMonitor');

export type SafetyAction = 'raise' | 'acknowledge';

// null = rejected; the caller leaves the state untouched.
export const SAFETY_TRANSITIONS: Record<SafetyState, Record<SafetyAction, SafetyState | null>> = {
  [SafetyState.IDLE]: { raise: SafetyState.ACTIVE, acknowledge: null },
  [SafetyState.ACTIVE]: { raise: SafetyState.ACTIVE, acknowledge: SafetyState.ACKNOWLEDGED },
  [SafetyState.ACKNOWLEDGED]: { raise: SafetyState.ACTIVE, acknowledge: SafetyState.ACKNOWLEDGED }
};

export const nextSafetyState = (state: SafetyState, action: SafetyAction): SafetyState | null =>
  SAFETY_TRANSITIONS[state][action];

export const HISTORY_LIMITS: Record<SafetyEventType, number> = {
  [SafetyEventType.FALL]: 10,
  [SafetyEventType.EMERGENCY]: 10,
  [SafetyEventType.ASSISTANCE]: 20
};

export interface SafetyHistoryEntry {
  raisedAt: number;
  acknowledgedAt: number | null;
  subtype: AssistanceSubtype | null;
}

export interface RaiseOptions {
  subtype?: AssistanceSubtype;
  sourceTimestamp?: number | null;
}

export type SafetyTransitionListener = (transition: SafetyTransition) => void;

interface SafetySlot {
  event: SafetyEvent;
  history: SafetyHistoryEntry[];
}

const createSlot = (type: SafetyEventType): SafetySlot => ({
  event: {
    type,
    state: SafetyState.IDLE,
    raisedAt: null,
    acknowledgedAt: null,
    subtype: null,
    sourceTimestamp: null
  },
  history: []
});

/**
 * One independent state machine per safety event type.
 * Pollers and the dashboard go through raise()/acknowledge() only; each call
 * reads and updates a single slot synchronously, so no other task observes a half-applied transition.
 */
export class SafetyEventMonitor {
  private readonly slots = new Map<SafetyEventType, SafetySlot>();
  private readonly listeners = new Set<SafetyTransitionListener>();

  constructor(private readonly now: () => number = Date.now) {
    for (const type of Object.values(SafetyEventType)) {
      this.slots.set(type, createSlot(type));
    }
  }

  onTransition(listener: SafetyTransitionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  raise(type: SafetyEventType, options: RaiseOptions = {}): SafetyTransition | null {
    const slot = this.slot(type);
    const previous = slot.event;
    const sourceTimestamp = options.sourceTimestamp ?? null;

    // The hub keeps reporting an incident until it is cleared there too.
    if (
      previous.state === SafetyState.ACKNOWLEDGED &&
      sourceTimestamp !== null &&
      sourceTimestamp === previous.sourceTimestamp
    ) {
      log.debug(`Ignoring stale ${type} reading for acknowledged incident`);
      return null;
    }

    const next = nextSafetyState(previous.state, 'raise');
    if (next === null) return null;

    const at = this.now();
    const subtype = type === SafetyEventType.ASSISTANCE ? options.subtype ?? AssistanceSubtype.GENERAL : null;

    if (previous.state === SafetyState.ACTIVE) {
      slot.event = { ...previous, raisedAt: at, subtype, sourceTimestamp: sourceTimestamp ?? previous.sourceTimestamp };
      const current = slot.history[slot.history.length - 1];
      if (current) {
        current.raisedAt = at;
        current.subtype = subtype;
      }
      return this.emit({ kind: 'refreshed', event: { ...slot.event }, at });
    }

    slot.event = {
      type,
      state: next,
      raisedAt: at,
      acknowledgedAt: null,
      subtype,
      sourceTimestamp
    };
    slot.history.push({ raisedAt: at, acknowledgedAt: null, subtype });
    if (slot.history.length > HISTORY_LIMITS[type]) slot.history.shift();

    log.warn(`${type.toUpperCase()} raised${subtype ? ` (${subtype})` : ''}`);
    return this.emit({ kind: 'raised', event: { ...slot.event }, at });
  }

  acknowledge(type: SafetyEventType): SafetyTransition | null {
    const slot = this.slot(type);
    const previous = slot.event;
    const next = nextSafetyState(previous.state, 'acknowledge');

    // Idle: nothing to acknowledge. Acknowledged: idempotent no-op.
    if (next === null || previous.state === SafetyState.ACKNOWLEDGED) return null;

    const at = this.now();
    slot.event = { ...previous, state: next, acknowledgedAt: at };
    const current = slot.history[slot.history.length - 1];
    if (current) current.acknowledgedAt = at;

    log.info(`${type} acknowledged`);
    return this.emit({ kind: 'acknowledged', event: { ...slot.event }, at });
  }

  status(type: SafetyEventType): SafetyEvent {
    return { ...this.slot(type).event };
  }

  isActive(type: SafetyEventType): boolean {
    return this.slot(type).event.state === SafetyState.ACTIVE;
  }

  activeTypes(): SafetyEventType[] {
    return Object.values(SafetyEventType).filter((type) => this.isActive(type));
  }

  history(type: SafetyEventType): SafetyHistoryEntry[] {
    return this.slot(type).history.map((entry) => ({ ...entry }));
  }

  private slot(type: SafetyEventType): SafetySlot {
    let slot = this.slots.get(type);
    if (!slot) {
      slot = createSlot(type);
      this.slots.set(type, slot);
    }
    return slot;
  }

  private emit(transition: SafetyTransition): SafetyTransition {
    for (const listener of this.listeners) {
      try {
        listener(transition);
      } catch (error) {
        log.error(`Transition listener failed for ${transition.event.type}`, error);
      }
    }
    return transition;
  }
}
