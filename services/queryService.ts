import { AlertRow, DetectionRow, SceneSummaryRow, SessionRow, VoiceCommandRow } from '../db/schema';
import { ConnectivityEntry, EnvironmentalReading, SafetyEventType, SafetyState } from '../types';
import { ASSISTANCE_LABELS } from './alerts';
import { ConnectivityMonitor } from './connectivity';
import { DataLogger, SessionDetails } from './dataLogger';
import { SafetyEventMonitor, SafetyHistoryEntry } from './safetyMonitor';

const iso = (ms: number): string => new Date(ms).toISOString();
const isoOrNull = (ms: number | null): string | null => (ms === null ? null : iso(ms));
// The dashboard multiplies last_*_timestamp by 1000, as it does for the sensor hub.
const epochSeconds = (ms: number | null): number | null => (ms === null ? null : ms / 1000);

export const sessionJson = (row: SessionRow) => ({
  id: row.id,
  start_time: iso(row.startTime),
  end_time: isoOrNull(row.endTime),
  duration_seconds: row.durationSeconds,
  total_detections: row.totalDetections,
  total_alerts: row.totalAlerts,
  critical_alerts: row.criticalAlerts
});

export const alertJson = (row: AlertRow) => ({
  id: row.id,
  session_id: row.sessionId,
  timestamp: iso(row.timestamp),
  category: row.category,
  distance_category: row.distanceCategory,
  object_type: row.objectType,
  direction: row.direction,
  alert_text: row.alertText
});

const detectionJson = (row: DetectionRow) => ({
  id: row.id,
  session_id: row.sessionId,
  timestamp: iso(row.timestamp),
  object_type: row.objectType,
  distance_category: row.distanceCategory,
  direction: row.direction,
  size: row.size,
  confidence: row.confidence,
  bbox: row.x1 === null || row.y1 === null || row.x2 === null || row.y2 === null ? null : [row.x1, row.y1, row.x2, row.y2],
  admitted: row.admitted
});

const voiceCommandJson = (row: VoiceCommandRow) => ({
  id: row.id,
  session_id: row.sessionId,
  timestamp: iso(row.timestamp),
  command: row.command,
  response: row.response
});

const sceneSummaryJson = (row: SceneSummaryRow) => ({
  id: row.id,
  session_id: row.sessionId,
  timestamp: iso(row.timestamp),
  summary_text: row.summaryText,
  object_count: row.objectCount
});

const sessionDetailsJson = (details: SessionDetails) => ({
  ...sessionJson(details),
  object_distribution: details.objectDistribution.map((entry) => ({ object_type: entry.objectType, count: entry.count })),
  alert_timeline: details.alertTimeline.map((entry) => ({
    timestamp: iso(entry.timestamp),
    object_type: entry.objectType,
    distance_category: entry.distanceCategory,
    direction: entry.direction
  }))
});

const connectivityJson = (entry: ConnectivityEntry) => ({
  status: entry.status,
  last_success: isoOrNull(entry.lastSuccess),
  last_failure: isoOrNull(entry.lastFailure),
  last_error: entry.lastError
});

const historyJson = (entry: SafetyHistoryEntry) => ({
  timestamp: iso(entry.raisedAt),
  acknowledged_at: isoOrNull(entry.acknowledgedAt)
});

export type SessionJson = ReturnType<typeof sessionJson>;
export type AlertJson = ReturnType<typeof alertJson>;

export interface QueryServiceDeps {
  dataLogger: DataLogger;
  monitor: SafetyEventMonitor;
  connectivity: ConnectivityMonitor;
  environment: () => EnvironmentalReading;
  now?: () => number;
}

/**
 * Read-only projections for the caregiver dashboard, shaped as snake_case JSON.
 * Nothing here mutates state.
 */
export class QueryService {
  private readonly now: () => number;

  constructor(private readonly deps: QueryServiceDeps) {
    this.now = deps.now ?? Date.now;
  }

  status() {
    const current = this.deps.dataLogger.currentSessionId();
    const snapshot = this.deps.connectivity.snapshot();
    return {
      status: current === null ? 'inactive' : 'active',
      current_session_id: current,
      timestamp: iso(this.now()),
      connectivity: {
        fall: connectivityJson(snapshot.fall),
        emergency: connectivityJson(snapshot.emergency),
        assistance: connectivityJson(snapshot.assistance),
        environmental: connectivityJson(snapshot.environmental),
        video: connectivityJson(snapshot.video)
      }
    };
  }

  health() {
    return { status: 'healthy', timestamp: iso(this.now()) };
  }

  sessions(): SessionJson[] {
    return this.deps.dataLogger.getAllSessions().map(sessionJson);
  }

  session(id: number) {
    const details = this.deps.dataLogger.getSessionStats(id);
    return details ? sessionDetailsJson(details) : null;
  }

  exportSession(id: number) {
    const data = this.deps.dataLogger.exportSession(id);
    if (!data) return null;
    return {
      ...sessionJson(data.session),
      detections: data.detections.map(detectionJson),
      alerts: data.alerts.map(alertJson),
      voice_commands: data.voiceCommands.map(voiceCommandJson),
      scene_summaries: data.sceneSummaries.map(sceneSummaryJson)
    };
  }

  recentAlerts(limit = 50): AlertJson[] {
    return this.deps.dataLogger.getRecentAlerts(limit).map(alertJson);
  }

  voiceCommands(limit = 50) {
    return this.deps.dataLogger.getVoiceCommands(limit).map(voiceCommandJson);
  }

  overview() {
    const overall = this.deps.dataLogger.getOverallStats();
    const current = this.deps.dataLogger.currentSessionId();
    return {
      overall: {
        total_sessions: overall.totalSessions,
        total_duration: overall.totalDuration,
        total_detections: overall.totalDetections,
        total_alerts: overall.totalAlerts,
        total_critical_alerts: overall.totalCriticalAlerts
      },
      current_session: current === null ? null : this.session(current)
    };
  }

  objectStats() {
    const stats = this.deps.dataLogger.getObjectStats();
    return {
      common_objects: stats.commonObjects.map((entry) => ({ object_type: entry.objectType, count: entry.count })),
      distance_distribution: stats.distanceDistribution.map((entry) => ({
        distance_category: entry.distanceCategory,
        count: entry.count
      })),
      direction_distribution: stats.directionDistribution
    };
  }

  timeline(hours = 24) {
    const timeline = this.deps.dataLogger.getTimeline(hours);
    return {
      detections: timeline.detections,
      alerts: timeline.alerts.map((entry) => ({
        hour: entry.hour,
        distance_category: entry.distanceCategory,
        count: entry.count
      }))
    };
  }

  safetyMetrics() {
    const metrics = this.deps.dataLogger.getSafetyMetrics();
    return {
      critical_alerts_24h: metrics.criticalAlerts24h,
      warning_alerts_24h: metrics.warningAlerts24h,
      safety_alerts_24h: metrics.safetyAlerts24h,
      dangerous_hours: metrics.dangerousHours,
      dangerous_objects: metrics.dangerousObjects.map((entry) => ({ object_type: entry.objectType, count: entry.count }))
    };
  }

  fallStatus() {
    const event = this.deps.monitor.status(SafetyEventType.FALL);
    return {
      fall_detected: event.state === SafetyState.ACTIVE,
      state: event.state,
      last_fall_timestamp: epochSeconds(event.raisedAt),
      acknowledged_at: isoOrNull(event.acknowledgedAt),
      fall_history: this.deps.monitor.history(SafetyEventType.FALL).map(historyJson)
    };
  }

  emergencyStatus() {
    const event = this.deps.monitor.status(SafetyEventType.EMERGENCY);
    return {
      emergency_active: event.state === SafetyState.ACTIVE,
      state: event.state,
      last_emergency_timestamp: epochSeconds(event.raisedAt),
      acknowledged_at: isoOrNull(event.acknowledgedAt),
      emergency_history: this.deps.monitor.history(SafetyEventType.EMERGENCY).map(historyJson)
    };
  }

  assistanceStatus() {
    const event = this.deps.monitor.status(SafetyEventType.ASSISTANCE);
    const active = event.state === SafetyState.ACTIVE;
    return {
      assistance_active: active,
      assistance_type: active && event.subtype ? ASSISTANCE_LABELS[event.subtype] : null,
      state: event.state,
      last_assistance_timestamp: epochSeconds(event.raisedAt),
      acknowledged_at: isoOrNull(event.acknowledgedAt),
      assistance_history: this.deps.monitor.history(SafetyEventType.ASSISTANCE).map((entry) => ({
        ...historyJson(entry),
        type: entry.subtype ? ASSISTANCE_LABELS[entry.subtype] : null
      }))
    };
  }

  environmental() {
    const reading = this.deps.environment();
    return {
      temperature_c: reading.temperatureC,
      temperature_f: reading.temperatureF,
      humidity: reading.humidity,
      pressure: reading.pressure,
      last_update: reading.lastUpdate
    };
  }
}
