import axios, { AxiosInstance } from 'axios';
import { AssistanceSubtype, ConnectivitySource, EnvironmentalReading, SafetyEventType } from '../types';
import { ASSISTANCE_LABELS } from './alerts';
import { ConnectivityMonitor } from './connectivity';
import { ConnectivityError, describeError } from './errors';
import { createLogger } from './logger';
import { PeriodicTask } from './periodicTask';
import { SafetyEventMonitor } from './safetyMonitor';

const log = createLogger('SensorPoller');

export interface SensorPollerOptions {
  baseUrl: string;
  timeoutMs?: number;
  maxBackoffMs?: number;
  intervals?: Partial<Record<Exclude<ConnectivitySource, 'video'>, number>>;
  client?: AxiosInstance;
}

export const DEFAULT_POLL_INTERVALS: Record<Exclude<ConnectivitySource, 'video'>, number> = {
  fall: 3000,
  emergency: 2000,
  assistance: 2000,
  environmental: 30000
};

export const EMPTY_ENVIRONMENT: EnvironmentalReading = {
  temperatureC: null,
  temperatureF: null,
  humidity: null,
  pressure: null,
  lastUpdate: null
};

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const optionalNumber = (value: unknown): number | null => (typeof value === 'number' && Number.isFinite(value) ? value : null);

// Hub timestamps are epoch seconds (float)
const toMillis = (seconds: unknown): number | null => {
  const value = optionalNumber(seconds);
  return value === null ? null : Math.round(value * 1000);
};

export const subtypeFromLabel = (label: unknown): AssistanceSubtype => {
  if (typeof label === 'string') {
    const normalized = label.trim().toLowerCase();
    for (const subtype of Object.values(AssistanceSubtype)) {
      if (ASSISTANCE_LABELS[subtype].toLowerCase() === normalized || subtype === normalized) return subtype;
    }
  }
  return AssistanceSubtype.GENERAL;
};

export const environmentWarnings = (reading: EnvironmentalReading): string[] => {
  const warnings: string[] = [];
  if (reading.temperatureF !== null && reading.temperatureF > 85) warnings.push(`High temperature: ${reading.temperatureF}°F`);
  if (reading.temperatureF !== null && reading.temperatureF < 60) warnings.push(`Low temperature: ${reading.temperatureF}°F`);
  if (reading.humidity !== null && reading.humidity > 70) warnings.push(`High humidity: ${reading.humidity}%`);
  if (reading.humidity !== null && reading.humidity < 30) warnings.push(`Low humidity: ${reading.humidity}%`);
  return warnings;
};

const ACK_PATHS: Record<SafetyEventType, string> = {
  [SafetyEventType.FALL]: '/api/fall_acknowledge',
  [SafetyEventType.EMERGENCY]: '/api/emergency_acknowledge',
  [SafetyEventType.ASSISTANCE]: '/api/assistance_acknowledge'
};

/**
 * Polls the sensor hub. One periodic task per endpoint so a slow environmental
 * read never delays the fall check. Readings only ever reach safety state through
 * monitor.raise(); a failed poll changes connectivity, nothing else.
 */
export class SensorPoller {
  private readonly client: AxiosInstance;
  private readonly tasks: PeriodicTask[];
  private environment: EnvironmentalReading = { ...EMPTY_ENVIRONMENT };

  constructor(
    private readonly monitor: SafetyEventMonitor,
    private readonly connectivity: ConnectivityMonitor,
    options: SensorPollerOptions
  ) {
    this.client = options.client ?? axios.create({ baseURL: options.baseUrl, timeout: options.timeoutMs ?? 2000 });
    const intervals = { ...DEFAULT_POLL_INTERVALS, ...options.intervals };

    const task = (source: Exclude<ConnectivitySource, 'video'>, run: (signal: AbortSignal) => Promise<void>) =>
      new PeriodicTask({
        name: `Poll:${source}`,
        intervalMs: intervals[source],
        maxBackoffMs: options.maxBackoffMs ?? 30000,
        run
      });

    this.tasks = [
      task('fall', (signal) => this.pollFall(signal)),
      task('emergency', (signal) => this.pollEmergency(signal)),
      task('assistance', (signal) => this.pollAssistance(signal)),
      task('environmental', (signal) => this.pollEnvironmental(signal))
    ];
  }

  get latestEnvironment(): EnvironmentalReading {
    return { ...this.environment };
  }

  start(): void {
    this.tasks.forEach((task) => task.start());
    log.info('Sensor hub polling started');
  }

  async stop(): Promise<void> {
    await Promise.all(this.tasks.map((task) => task.stop()));
  }

  async pollFall(signal?: AbortSignal): Promise<void> {
    const body = await this.fetch('fall', '/api/fall_status', signal);
    if (typeof body.fall_detected !== 'boolean') throw this.malformed('fall', 'fall_detected');
    this.connectivity.markOnline('fall');
    if (body.fall_detected) {
      this.monitor.raise(SafetyEventType.FALL, { sourceTimestamp: toMillis(body.last_fall_timestamp) });
    }
  }

  async pollEmergency(signal?: AbortSignal): Promise<void> {
    const body = await this.fetch('emergency', '/api/emergency_status', signal);
    if (typeof body.emergency_active !== 'boolean') throw this.malformed('emergency', 'emergency_active');
    this.connectivity.markOnline('emergency');
    if (body.emergency_active) {
      this.monitor.raise(SafetyEventType.EMERGENCY, { sourceTimestamp: toMillis(body.last_emergency_timestamp) });
    }
  }

  async pollAssistance(signal?: AbortSignal): Promise<void> {
    const body = await this.fetch('assistance', '/api/assistance_status', signal);
    if (typeof body.assistance_active !== 'boolean') throw this.malformed('assistance', 'assistance_active');
    this.connectivity.markOnline('assistance');
    if (body.assistance_active) {
      this.monitor.raise(SafetyEventType.ASSISTANCE, {
        subtype: subtypeFromLabel(body.assistance_type),
        sourceTimestamp: toMillis(body.last_assistance_timestamp)
      });
    }
  }

  async pollEnvironmental(signal?: AbortSignal): Promise<void> {
    const body = await this.fetch('environmental', '/api/environmental', signal);
    const reading: EnvironmentalReading = {
      temperatureC: optionalNumber(body.temperature_c),
      temperatureF: optionalNumber(body.temperature_f),
      humidity: optionalNumber(body.humidity),
      pressure: optionalNumber(body.pressure),
      lastUpdate: typeof body.last_update === 'string' ? body.last_update : null
    };
    this.environment = reading;
    this.connectivity.markOnline('environmental');
    for (const warning of environmentWarnings(reading)) log.warn(warning);
  }

  /** Clears the hub's own flag. Failure is logged; local state is already acknowledged. */
  async acknowledgeRemote(type: SafetyEventType): Promise<boolean> {
    try {
      await this.client.get(ACK_PATHS[type]);
      return true;
    } catch (error) {
      log.warn(`Could not forward ${type} acknowledgement to the sensor hub: ${describeError(error)}`);
      return false;
    }
  }

  private async fetch(source: ConnectivitySource, path: string, signal?: AbortSignal): Promise<JsonObject> {
    let data: unknown;
    try {
      const response = await this.client.get<unknown>(path, { signal });
      data = response.data;
    } catch (error) {
      if (signal?.aborted) throw error;
      const reason = describeError(error);
      this.connectivity.markDegraded(source, reason);
      throw new ConnectivityError(`${source} poll failed: ${reason}`, source, { cause: error });
    }
    if (!isObject(data)) throw this.malformed(source, 'body');
    return data;
  }

  private malformed(source: ConnectivitySource, field: string): ConnectivityError {
    const reason = `malformed payload (${field})`;
    this.connectivity.markDegraded(source, reason);
    return new ConnectivityError(`${source} poll failed: ${reason}`, source);
  }
}
