import { DetectionEvent } from '../types';
import { ConnectivityMonitor } from './connectivity';
import { describeError } from './errors';
import { DetectionSource, toDetectionEvents } from './detectionSource';
import { createLogger } from './logger';
import { PeriodicTask } from './periodicTask';

const log = createLogger('Detection');

export const DEFAULT_INFERENCE_INTERVAL_MS = 5000;

export interface DetectionProducerOptions {
  source: DetectionSource;
  relevantClasses: Set<string>;
  connectivity: ConnectivityMonitor;
  onDetections: (events: DetectionEvent[]) => void;
  intervalMs?: number;
  maxBackoffMs?: number;
  now?: () => number;
}

// Periodic inference cycle: pull one frame, keep relevant classes, hand the batch to the pipeline.
export class DetectionProducer {
  private readonly task: PeriodicTask;
  private readonly now: () => number;
  private cycles = 0;

  constructor(private readonly options: DetectionProducerOptions) {
    this.now = options.now ?? Date.now;
    this.task = new PeriodicTask({
      name: 'Detection',
      intervalMs: options.intervalMs ?? DEFAULT_INFERENCE_INTERVAL_MS,
      maxBackoffMs: options.maxBackoffMs,
      run: (signal) => this.runCycle(signal).then(() => undefined)
    });
  }

  get cycleCount(): number {
    return this.cycles;
  }

  start(): void {
    this.task.start();
  }

  stop(): Promise<void> {
    return this.task.stop();
  }

  async runCycle(signal?: AbortSignal): Promise<DetectionEvent[]> {
    const { source, connectivity, relevantClasses, onDetections } = this.options;
    let events: DetectionEvent[];
    try {
      const frame = await source.detect(signal);
      events = toDetectionEvents(frame, relevantClasses, this.now());
    } catch (error) {
      if (!signal?.aborted) connectivity.markDegraded('video', describeError(error));
      throw error;
    }
    connectivity.markOnline('video');
    this.cycles += 1;
    log.debug(`Cycle ${this.cycles}: ${events.length} relevant detection(s)`);
    onDetections(events);
    return events;
  }
}
