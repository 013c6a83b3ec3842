import { describe, expect, it } from 'vitest';
import { ProximityZone } from '../types';
import {
  classifyDetection,
  classifyDirection,
  classifyZone,
  describeProximity,
  frameRelativeSize
} from './proximityClassifier';

describe('classifyZone', () => {
  it.each([
    [1, ProximityZone.CRITICAL],
    [0.65, ProximityZone.CRITICAL],
    [0.6, ProximityZone.CRITICAL],
    [0.59, ProximityZone.WARNING],
    [0.4, ProximityZone.WARNING],
    [0.39, ProximityZone.FAR],
    [0, ProximityZone.FAR]
  ])('maps size %s to %s', (size, zone) => {
    expect(classifyZone(size)).toBe(zone);
  });
});

describe('classifyDirection', () => {
  it('splits the frame into thirds at the box centre', () => {
    expect(classifyDirection(100, 640)).toBe('left');
    expect(classifyDirection(320, 640)).toBe('ahead');
    expect(classifyDirection(500, 640)).toBe('right');
  });

  it('keeps the band edges ahead', () => {
    expect(classifyDirection(33, 100)).toBe('ahead');
    expect(classifyDirection(67, 100)).toBe('ahead');
  });
});

describe('frameRelativeSize', () => {
  it('uses the larger of the width and height ratios', () => {
    expect(frameRelativeSize({ x1: 0, y1: 0, x2: 64, y2: 312 }, 640, 480)).toBe(0.65);
  });

  it('clamps boxes larger than the frame and ignores empty frames', () => {
    expect(frameRelativeSize({ x1: -10, y1: 0, x2: 700, y2: 10 }, 640, 480)).toBe(1);
    expect(frameRelativeSize({ x1: 0, y1: 0, x2: 10, y2: 10 }, 0, 480)).toBe(0);
  });
});

describe('classifyDetection', () => {
  it('builds a proximity event from a detection', () => {
    const event = classifyDetection({
      objectType: 'person',
      size: 0.65,
      xCenter: 320,
      frameWidth: 640,
      timestamp: 1000,
      confidence: 0.9
    });
    expect(event).toEqual({
      objectType: 'person',
      direction: 'ahead',
      zone: ProximityZone.CRITICAL,
      size: 0.65,
      timestamp: 1000,
      confidence: 0.9
    });
  });

  it('rejects detections it cannot place', () => {
    const base = { objectType: 'car', size: 0.5, xCenter: 10, frameWidth: 640, timestamp: 0 };
    expect(classifyDetection({ ...base, objectType: '  ' })).toBeNull();
    expect(classifyDetection({ ...base, size: Number.NaN })).toBeNull();
    expect(classifyDetection({ ...base, frameWidth: 0 })).toBeNull();
  });

  it('clamps out-of-range sizes', () => {
    const event = classifyDetection({ objectType: 'car', size: 1.4, xCenter: 10, frameWidth: 640, timestamp: 0 });
    expect(event?.size).toBe(1);
    expect(event?.zone).toBe(ProximityZone.CRITICAL);
  });
});

describe('describeProximity', () => {
  it('renders the spoken alert text', () => {
    expect(describeProximity({ objectType: 'person', direction: 'ahead', zone: ProximityZone.CRITICAL })).toBe(
      'person ahead, critical'
    );
    expect(describeProximity({ objectType: 'chair', direction: 'left', zone: ProximityZone.WARNING })).toBe(
      'chair to the left, warning'
    );
  });
});
