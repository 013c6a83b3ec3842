export enum ProximityZone {
  CRITICAL = 'critical',
  WARNING = 'warning',
  FAR = 'far'
}

export type Direction = 'left' | 'ahead' | 'right';

export interface BoundingBox {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface DetectionEvent {
  objectType: string;
  size: number; // frame-relative, 0..1
  xCenter: number; // pixels
  frameWidth: number;
  timestamp: number; // ms epoch
  confidence?: number;
  bbox?: BoundingBox;
}

export interface ProximityEvent {
  objectType: string;
  direction: Direction;
  zone: ProximityZone;
  size: number;
  timestamp: number;
  confidence?: number;
  bbox?: BoundingBox;
}

export enum SafetyEventType {
  FALL = 'fall',
  EMERGENCY = 'emergency',
  ASSISTANCE = 'assistance'
}

export enum AssistanceSubtype {
  GENERAL = 'general',
  BATHROOM = 'bathroom',
  FOOD_WATER = 'food_water',
  MEDICATION = 'medication'
}

export enum SafetyState {
  IDLE = 'IDLE',
  ACTIVE = 'ACTIVE',
  ACKNOWLEDGED = 'ACKNOWLEDGED'
}

export interface SafetyEvent {
  type: SafetyEventType;
  state: SafetyState;
  raisedAt: number | null;
  acknowledgedAt: number | null;
  subtype: AssistanceSubtype | null;
  sourceTimestamp: number | null; // incident timestamp reported by the sensor hub
}

export type SafetyTransitionKind = 'raised' | 'refreshed' | 'acknowledged';

export interface SafetyTransition {
  kind: SafetyTransitionKind;
  event: SafetyEvent;
  at: number;
}

export interface ProximityAlert {
  kind: 'proximity';
  message: string;
  createdAt: number;
  event: ProximityEvent;
}

export interface SafetyAlert {
  kind: 'safety';
  message: string;
  createdAt: number;
  transition: SafetyTransition;
}

export type Alert = ProximityAlert | SafetyAlert;

export type ConnectivitySource = 'fall' | 'emergency' | 'assistance' | 'environmental' | 'video';
export type ConnectivityStatus = 'online' | 'degraded' | 'unknown';

export interface ConnectivityEntry {
  status: ConnectivityStatus;
  lastSuccess: number | null;
  lastFailure: number | null;
  lastError: string | null;
}

export interface EnvironmentalReading {
  temperatureC: number | null;
  temperatureF: number | null;
  humidity: number | null;
  pressure: number | null;
  lastUpdate: string | null;
}

export enum IntentType {
  DESCRIBE = 'DESCRIBE',
  SAFETY_CHECK = 'SAFETY_CHECK',
  STATUS = 'STATUS',
  REQUEST_ASSISTANCE = 'REQUEST_ASSISTANCE',
  EMERGENCY = 'EMERGENCY',
  REPEAT = 'REPEAT',
  UNKNOWN = 'UNKNOWN'
}

export interface IntentResult {
  type: IntentType;
  confidence: number;
  originalQuery: string;
  assistanceType?: AssistanceSubtype; // For REQUEST_ASSISTANCE
}

export interface VoiceCommandOutcome {
  intent: IntentResult;
  response: string;
}

export type EscalationPolicy = 'respect-cooldown' | 'bypass-on-escalation';
