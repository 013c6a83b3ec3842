import { describe, expect, it } from 'vitest';
import { ProximityEvent, ProximityZone } from '../types';
import { alertKey, CooldownTracker } from './cooldownTracker';

const person = (timestamp: number, zone = ProximityZone.CRITICAL, direction: ProximityEvent['direction'] = 'ahead'): ProximityEvent => ({
  objectType: 'person',
  direction,
  zone,
  size: zone === ProximityZone.CRITICAL ? 0.7 : 0.5,
  timestamp
});

describe('CooldownTracker', () => {
  it('suppresses the same key inside the window and admits it after', () => {
    const tracker = new CooldownTracker();
    expect(tracker.admit(person(0))).toBe(true);
    expect(tracker.admit(person(1000))).toBe(false);
    expect(tracker.admit(person(3100))).toBe(true);
  });

  it('measures the window from the last admitted event, not the last seen one', () => {
    const tracker = new CooldownTracker();
    tracker.admit(person(0));
    tracker.admit(person(2000));
    expect(tracker.admit(person(3000))).toBe(true);
  });

  it('keys on object type and direction only', () => {
    const tracker = new CooldownTracker();
    expect(tracker.admit(person(0))).toBe(true);
    expect(tracker.admit(person(100, ProximityZone.CRITICAL, 'left'))).toBe(true);
    expect(tracker.admit({ ...person(100), objectType: 'car' })).toBe(true);
    expect(tracker.admit(person(200, ProximityZone.WARNING))).toBe(false);
    expect(alertKey(person(0))).toBe('person:ahead');
  });

  it('respects the cooldown on escalation by default', () => {
    const tracker = new CooldownTracker();
    tracker.admit(person(0, ProximityZone.WARNING));
    expect(tracker.admit(person(1000, ProximityZone.CRITICAL))).toBe(false);
  });

  it('lets an escalation through under the bypass policy', () => {
    const tracker = new CooldownTracker({ escalation: 'bypass-on-escalation' });
    tracker.admit(person(0, ProximityZone.WARNING));
    expect(tracker.admit(person(1000, ProximityZone.CRITICAL))).toBe(true);
    expect(tracker.admit(person(1500, ProximityZone.CRITICAL))).toBe(false);
    expect(tracker.admit(person(1600, ProximityZone.WARNING))).toBe(false);
  });

  it('prunes expired keys', () => {
    const tracker = new CooldownTracker({ windowMs: 3000 });
    tracker.admit(person(0));
    tracker.admit({ ...person(2500), objectType: 'car' });
    expect(tracker.prune(3000)).toBe(1);
    expect(tracker.snapshot()).toEqual([{ key: 'car:ahead', at: 2500, zone: ProximityZone.CRITICAL }]);
    expect(tracker.lastAdmittedAt('person:ahead')).toBeUndefined();
  });
});
