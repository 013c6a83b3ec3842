import { describe, expect, it } from 'vitest';
import { AssistanceSubtype, SafetyEventType, SafetyState, SafetyTransition } from '../types';
import { nextSafetyState, SafetyEventMonitor } from './safetyMonitor';

const clock = (start = 0) => {
  let current = start;
  return {
    now: () => current,
    set: (value: number) => {
      current = value;
    }
  };
};

describe('nextSafetyState', () => {
  it('rejects acknowledging an idle event', () => {
    expect(nextSafetyState(SafetyState.IDLE, 'acknowledge')).toBeNull();
  });

  it('follows the transition table', () => {
    expect(nextSafetyState(SafetyState.IDLE, 'raise')).toBe(SafetyState.ACTIVE);
    expect(nextSafetyState(SafetyState.ACTIVE, 'raise')).toBe(SafetyState.ACTIVE);
    expect(nextSafetyState(SafetyState.ACTIVE, 'acknowledge')).toBe(SafetyState.ACKNOWLEDGED);
    expect(nextSafetyState(SafetyState.ACKNOWLEDGED, 'raise')).toBe(SafetyState.ACTIVE);
  });
});

describe('SafetyEventMonitor', () => {
  it('raises, refreshes and acknowledges a fall', () => {
    const time = clock(1000);
    const monitor = new SafetyEventMonitor(time.now);
    const transitions: SafetyTransition[] = [];
    monitor.onTransition((transition) => transitions.push(transition));

    expect(monitor.raise(SafetyEventType.FALL)?.kind).toBe('raised');
    time.set(2000);
    expect(monitor.raise(SafetyEventType.FALL)?.kind).toBe('refreshed');
    expect(monitor.status(SafetyEventType.FALL).raisedAt).toBe(2000);
    expect(monitor.history(SafetyEventType.FALL)).toHaveLength(1);

    time.set(3000);
    expect(monitor.acknowledge(SafetyEventType.FALL)?.kind).toBe('acknowledged');
    expect(monitor.status(SafetyEventType.FALL)).toMatchObject({ state: SafetyState.ACKNOWLEDGED, acknowledgedAt: 3000 });
    expect(monitor.isActive(SafetyEventType.FALL)).toBe(false);
    expect(transitions.map((transition) => transition.kind)).toEqual(['raised', 'refreshed', 'acknowledged']);
  });

  it('acknowledges at most once', () => {
    const monitor = new SafetyEventMonitor();
    const transitions: SafetyTransition[] = [];
    monitor.onTransition((transition) => transitions.push(transition));

    monitor.raise(SafetyEventType.EMERGENCY);
    expect(monitor.acknowledge(SafetyEventType.EMERGENCY)).not.toBeNull();
    expect(monitor.acknowledge(SafetyEventType.EMERGENCY)).toBeNull();
    expect(transitions.filter((transition) => transition.kind === 'acknowledged')).toHaveLength(1);
  });

  it('ignores an acknowledgement with nothing raised', () => {
    const monitor = new SafetyEventMonitor();
    expect(monitor.acknowledge(SafetyEventType.FALL)).toBeNull();
    expect(monitor.status(SafetyEventType.FALL).state).toBe(SafetyState.IDLE);
  });

  it('keeps each event type independent', () => {
    const monitor = new SafetyEventMonitor();
    monitor.raise(SafetyEventType.FALL);
    monitor.raise(SafetyEventType.ASSISTANCE, { subtype: AssistanceSubtype.BATHROOM });
    expect(monitor.activeTypes()).toEqual([SafetyEventType.FALL, SafetyEventType.ASSISTANCE]);
    expect(monitor.status(SafetyEventType.ASSISTANCE).subtype).toBe(AssistanceSubtype.BATHROOM);
    expect(monitor.status(SafetyEventType.FALL).subtype).toBeNull();
  });

  it('ignores a stale hub reading for an acknowledged incident but accepts a new one', () => {
    const monitor = new SafetyEventMonitor();
    monitor.raise(SafetyEventType.FALL, { sourceTimestamp: 5000 });
    monitor.acknowledge(SafetyEventType.FALL);

    expect(monitor.raise(SafetyEventType.FALL, { sourceTimestamp: 5000 })).toBeNull();
    expect(monitor.status(SafetyEventType.FALL).state).toBe(SafetyState.ACKNOWLEDGED);

    expect(monitor.raise(SafetyEventType.FALL, { sourceTimestamp: 9000 })?.kind).toBe('raised');
    expect(monitor.history(SafetyEventType.FALL)).toHaveLength(2);
  });

  it('bounds the history per type', () => {
    const monitor = new SafetyEventMonitor();
    for (let i = 0; i < 12; i++) {
      monitor.raise(SafetyEventType.FALL);
      monitor.acknowledge(SafetyEventType.FALL);
    }
    expect(monitor.history(SafetyEventType.FALL)).toHaveLength(10);
  });

  it('isolates a failing listener', () => {
    const monitor = new SafetyEventMonitor();
    const seen: string[] = [];
    monitor.onTransition(() => {
      throw new Error('listener failed');
    });
    monitor.onTransition((transition) => seen.push(transition.kind));
    expect(monitor.raise(SafetyEventType.FALL)?.kind).toBe('raised');
    expect(seen).toEqual(['raised']);
  });

  it('stops notifying after unsubscribe', () => {
    const monitor = new SafetyEventMonitor();
    const seen: string[] = [];
    const off = monitor.onTransition((transition) => seen.push(transition.kind));
    off();
    monitor.raise(SafetyEventType.FALL);
    expect(seen).toEqual([]);
  });
});
