import { describe, expect, it } from 'vitest';
import { Alert, ProximityZone, SafetyEventType, SafetyState } from '../types';
import { AlertAggregator } from './alertAggregator';
import { createProximityAlert, createSafetyAlert } from './alerts';
import { AbortedError } from './errors';

const proximity = (objectType: string, zone: ProximityZone, createdAt = 0): Alert =>
  createProximityAlert({ objectType, direction: 'ahead', zone, size: 0.5, timestamp: createdAt });

const fall = (at = 0): Alert =>
  createSafetyAlert({
    kind: 'raised',
    at,
    event: {
      type: SafetyEventType.FALL,
      state: SafetyState.ACTIVE,
      raisedAt: at,
      acknowledgedAt: null,
      subtype: null,
      sourceTimestamp: null
    }
  });

describe('AlertAggregator', () => {
  it('puts a critical alert ahead of a queued warning', async () => {
    const aggregator = new AlertAggregator({ staleAfterMs: 0 });
    aggregator.publish(proximity('chair', ProximityZone.WARNING));
    aggregator.publish(proximity('person', ProximityZone.CRITICAL));

    expect((await aggregator.next()).message).toBe('person ahead, critical');
    expect((await aggregator.next()).message).toBe('chair ahead, warning');
  });

  it('orders safety > critical > warning and keeps FIFO within a class', async () => {
    const aggregator = new AlertAggregator({ staleAfterMs: 0 });
    aggregator.publish(proximity('car', ProximityZone.WARNING));
    aggregator.publish(proximity('person', ProximityZone.CRITICAL));
    aggregator.publish(proximity('bus', ProximityZone.CRITICAL));
    aggregator.publish(fall());

    expect(aggregator.pending().map((alert) => alert.message)).toEqual([
      'Fall detected. Alerting your caregiver.',
      'person ahead, critical',
      'bus ahead, critical',
      'car ahead, warning'
    ]);
  });

  it('returns a put-back alert to the head of its class without notifying again', async () => {
    const aggregator = new AlertAggregator({ staleAfterMs: 0 });
    const seen: string[] = [];
    aggregator.subscribe((alert) => seen.push(alert.message));
    aggregator.publish(proximity('chair', ProximityZone.WARNING));
    aggregator.publish(proximity('person', ProximityZone.CRITICAL));

    const taken = await aggregator.next();
    aggregator.publish(fall());
    aggregator.publish(proximity('bus', ProximityZone.CRITICAL));
    aggregator.putBack(taken);

    expect(aggregator.pending().map((alert) => alert.message)).toEqual([
      'Fall detected. Alerting your caregiver.',
      'person ahead, critical',
      'bus ahead, critical',
      'chair ahead, warning'
    ]);
    expect(seen).toHaveLength(4);
  });

  it('fans far alerts out to subscribers without queueing them', () => {
    const aggregator = new AlertAggregator();
    const seen: string[] = [];
    aggregator.subscribe((alert) => seen.push(alert.message));

    expect(aggregator.publish(proximity('tree', ProximityZone.FAR))).toBe(false);
    expect(aggregator.size).toBe(0);
    expect(seen).toEqual(['tree ahead, far']);
  });

  it('hands an alert straight to a waiting consumer', async () => {
    const aggregator = new AlertAggregator();
    const pending = aggregator.next();
    expect(aggregator.publish(fall())).toBe(true);
    expect((await pending).kind).toBe('safety');
    expect(aggregator.size).toBe(0);
  });

  it('rejects a wait when the signal aborts', async () => {
    const aggregator = new AlertAggregator();
    const controller = new AbortController();
    const pending = aggregator.next(controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(AbortedError);

    // The aborted waiter no longer receives alerts.
    aggregator.publish(fall());
    expect(aggregator.size).toBe(1);
  });

  it('rejects waiters on close and refuses new alerts', async () => {
    const aggregator = new AlertAggregator();
    const pending = aggregator.next();
    aggregator.close();
    await expect(pending).rejects.toBeInstanceOf(AbortedError);
    expect(aggregator.publish(fall())).toBe(false);
  });

  it('drops the least urgent proximity alert when over capacity, never a safety alert', () => {
    const aggregator = new AlertAggregator({ capacity: 2, staleAfterMs: 0 });
    aggregator.publish(fall());
    aggregator.publish(proximity('person', ProximityZone.CRITICAL));
    aggregator.publish(proximity('chair', ProximityZone.WARNING));
    expect(aggregator.publish(proximity('car', ProximityZone.WARNING))).toBe(false);
    expect(aggregator.publish(proximity('bus', ProximityZone.CRITICAL))).toBe(true);

    expect(aggregator.pending().map((alert) => alert.message)).toEqual([
      'Fall detected. Alerting your caregiver.',
      'person ahead, critical',
      'bus ahead, critical'
    ]);
  });

  it('skips proximity alerts that went stale in the queue', async () => {
    let now = 0;
    const aggregator = new AlertAggregator({ staleAfterMs: 10_000, now: () => now });
    aggregator.publish(proximity('person', ProximityZone.CRITICAL, 0));
    aggregator.publish(fall(0));
    aggregator.publish(proximity('chair', ProximityZone.WARNING, 9_000));

    now = 15_000;
    expect((await aggregator.next()).kind).toBe('safety');
    expect((await aggregator.next()).message).toBe('chair ahead, warning');
    expect(aggregator.size).toBe(0);
  });
});
