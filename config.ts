import { EscalationPolicy } from './types';
import { StartupError } from './services/errors';

export interface AppConfig {
  port: number;
  databasePath: string;
  sensorHubUrl: string;
  detectorUrl: string;
  relevantClassesPath: string;
  geminiApiKey: string | null;
  inferenceIntervalMs: number;
  pollIntervals: {
    fall: number;
    emergency: number;
    assistance: number;
    environmental: number;
  };
  pollTimeoutMs: number;
  maxBackoffMs: number;
  alertCooldownMs: number;
  escalationPolicy: EscalationPolicy;
  alertQueueCapacity: number;
  staleAlertMs: number;
  speechCommand: string | null;
  voiceRecordSeconds: number;
}

type Env = Record<string, string | undefined>;

const readInt = (env: Env, name: string, fallback: number, { min = 1 }: { min?: number } = {}): number => {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  if (!/^-?\d+$/.test(raw)) throw new StartupError(`${name} must be an integer, got "${raw}"`);
  const value = Number(raw);
  if (value < min) throw new StartupError(`${name} must be at least ${min}, got ${value}`);
  return value;
};

const readString = (env: Env, name: string, fallback: string): string => env[name]?.trim() || fallback;

const isEscalationPolicy = (value: string): value is EscalationPolicy =>
  value === 'respect-cooldown' || value === 'bypass-on-escalation';

export function loadConfig(env: Env = process.env): AppConfig {
  const policy = readString(env, 'ESCALATION_POLICY', 'respect-cooldown');
  if (!isEscalationPolicy(policy)) {
    throw new StartupError(`ESCALATION_POLICY must be "respect-cooldown" or "bypass-on-escalation", got "${policy}"`);
  }

  const port = readInt(env, 'PORT', 5001);
  if (port > 65535) throw new StartupError(`PORT must be at most 65535, got ${port}`);

  return {
    port,
    databasePath: readString(env, 'DATABASE_PATH', 'vision_data.db'),
    sensorHubUrl: readString(env, 'SENSOR_HUB_URL', 'http://localhost:5000'),
    detectorUrl: readString(env, 'DETECTOR_URL', 'http://localhost:8500/detect'),
    relevantClassesPath: readString(env, 'RELEVANT_CLASSES_PATH', 'config/relevant_classes.txt'),
    geminiApiKey: env.GEMINI_API_KEY?.trim() || env.API_KEY?.trim() || null,
    inferenceIntervalMs: readInt(env, 'INFERENCE_INTERVAL_MS', 5000),
    pollIntervals: {
      fall: readInt(env, 'FALL_POLL_MS', 3000),
      emergency: readInt(env, 'EMERGENCY_POLL_MS', 2000),
      assistance: readInt(env, 'ASSISTANCE_POLL_MS', 2000),
      environmental: readInt(env, 'ENVIRONMENTAL_POLL_MS', 30000)
    },
    pollTimeoutMs: readInt(env, 'POLL_TIMEOUT_MS', 2000),
    maxBackoffMs: readInt(env, 'MAX_BACKOFF_MS', 30000),
    alertCooldownMs: readInt(env, 'ALERT_COOLDOWN_MS', 3000, { min: 0 }),
    escalationPolicy: policy,
    alertQueueCapacity: readInt(env, 'ALERT_QUEUE_CAPACITY', 32),
    staleAlertMs: readInt(env, 'STALE_ALERT_MS', 10000, { min: 0 }),
    speechCommand: env.SPEECH_COMMAND?.trim() || null,
    voiceRecordSeconds: readInt(env, 'VOICE_RECORD_SECONDS', 5)
  };
}
