import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import axios from 'axios';
import { describe, expect, it } from 'vitest';
import { ConnectivityMonitor } from './connectivity';
import { DetectionProducer } from './detectionProducer';
import {
  DetectionFrame,
  HttpDetectionSource,
  isDetectionFrame,
  loadRelevantClasses,
  parseRelevantClasses,
  toDetectionEvents
} from './detectionSource';
import { ConnectivityError, StartupError } from './errors';

const frame: DetectionFrame = {
  frame_width: 640,
  frame_height: 480,
  detections: [
    { name: 'person', confidence: 0.91, bbox: [280, 100, 360, 412] },
    { name: 'kite', confidence: 0.7, bbox: [0, 0, 10, 10] },
    { name: 'Chair', confidence: 0.55, bbox: [10, 200, 150, 392] }
  ]
};

describe('parseRelevantClasses', () => {
  it('reads one class per line, ignoring blanks and comments', () => {
    expect([...parseRelevantClasses('# obstacles\nperson\n\n  Car \r\nchair\n')]).toEqual(['person', 'car', 'chair']);
  });
});

describe('loadRelevantClasses', () => {
  it('fails startup when the file is missing or empty', () => {
    const dir = mkdtempSync(join(tmpdir(), 'classes-'));
    expect(() => loadRelevantClasses(join(dir, 'missing.txt'))).toThrow(StartupError);

    const empty = join(dir, 'empty.txt');
    writeFileSync(empty, '\n# nothing here\n');
    expect(() => loadRelevantClasses(empty)).toThrow('is empty');
  });

  it('loads the bundled class list', () => {
    expect(loadRelevantClasses('config/relevant_classes.txt').has('person')).toBe(true);
  });
});

describe('toDetectionEvents', () => {
  it('keeps relevant classes and derives size and centre from the box', () => {
    const events = toDetectionEvents(frame, new Set(['person', 'chair']), 5000);
    expect(events).toEqual([
      {
        objectType: 'person',
        size: 0.65,
        xCenter: 320,
        frameWidth: 640,
        timestamp: 5000,
        confidence: 0.91,
        bbox: { x1: 280, y1: 100, x2: 360, y2: 412 }
      },
      {
        objectType: 'chair',
        size: 0.4,
        xCenter: 80,
        frameWidth: 640,
        timestamp: 5000,
        confidence: 0.55,
        bbox: { x1: 10, y1: 200, x2: 150, y2: 392 }
      }
    ]);
  });
});

describe('isDetectionFrame', () => {
  it('rejects frames with malformed boxes', () => {
    expect(isDetectionFrame(frame)).toBe(true);
    expect(isDetectionFrame({ ...frame, detections: [{ name: 'person', confidence: 1, bbox: [1, 2, 3] }] })).toBe(false);
    expect(isDetectionFrame(null)).toBe(false);
  });
});

describe('HttpDetectionSource', () => {
  it('returns the detector frame', async () => {
    const client = axios.create({
      adapter: async (config) => ({ data: frame, status: 200, statusText: 'OK', headers: {}, config })
    });
    await expect(new HttpDetectionSource('http://detector.test', 1000, client).detect()).resolves.toEqual(frame);
  });

  it('wraps transport and payload failures as connectivity errors', async () => {
    const down = axios.create({
      adapter: async () => {
        throw new Error('socket hang up');
      }
    });
    const garbage = axios.create({
      adapter: async (config) => ({ data: 'not json', status: 200, statusText: 'OK', headers: {}, config })
    });
    await expect(new HttpDetectionSource('http://detector.test', 1000, down).detect()).rejects.toBeInstanceOf(
      ConnectivityError
    );
    await expect(new HttpDetectionSource('http://detector.test', 1000, garbage).detect()).rejects.toThrow(
      'Detector returned a malformed frame'
    );
  });
});

describe('DetectionProducer', () => {
  it('feeds one cycle of relevant detections and marks video online', async () => {
    const connectivity = new ConnectivityMonitor(() => 0);
    const batches: number[] = [];
    const producer = new DetectionProducer({
      source: { detect: async () => frame },
      relevantClasses: new Set(['person']),
      connectivity,
      onDetections: (events) => batches.push(events.length),
      now: () => 1000
    });

    const events = await producer.runCycle();
    expect(events.map((event) => event.objectType)).toEqual(['person']);
    expect(batches).toEqual([1]);
    expect(producer.cycleCount).toBe(1);
    expect(connectivity.get('video').status).toBe('online');
  });

  it('marks video degraded when the detector fails', async () => {
    const connectivity = new ConnectivityMonitor(() => 0);
    const producer = new DetectionProducer({
      source: {
        detect: async () => {
          throw new ConnectivityError('Detector unreachable: timeout', 'video');
        }
      },
      relevantClasses: new Set(['person']),
      connectivity,
      onDetections: () => undefined
    });

    await expect(producer.runCycle()).rejects.toThrow('Detector unreachable: timeout');
    expect(connectivity.get('video')).toMatchObject({ status: 'degraded', lastError: 'Detector unreachable: timeout' });
  });
});
