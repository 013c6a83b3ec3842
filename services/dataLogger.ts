import { and, asc, count, desc, eq, gt, inArray, isNull, sql } from 'drizzle-orm';
import { format } from 'date-fns';
import { AppDatabase } from '../db/client';
import {
  alerts,
  AlertRow,
  detections,
  DetectionRow,
  sceneSummaries,
  SceneSummaryRow,
  sessions,
  SessionRow,
  voiceCommands,
  VoiceCommandRow
} from '../db/schema';
import { Alert, ProximityEvent, ProximityZone } from '../types';
import { createLogger } from './logger';

const log = createLogger('DataLogger');

const HOUR_MS = 60 * 60 * 1000;
export const HOUR_BUCKET_FORMAT = 'yyyy-MM-dd HH:00';

export type AlertSeverity = AlertRow['distanceCategory'];

export const alertSeverity = (alert: Alert): AlertSeverity => (alert.kind === 'safety' ? 'safety' : alert.event.zone);

export interface ObjectCount {
  objectType: string;
  count: number;
}

export interface SessionDetails extends SessionRow {
  objectDistribution: ObjectCount[];
  alertTimeline: Array<Pick<AlertRow, 'timestamp' | 'objectType' | 'distanceCategory' | 'direction'>>;
}

export interface OverallStats {
  totalSessions: number;
  totalDuration: number;
  totalDetections: number;
  totalAlerts: number;
  totalCriticalAlerts: number;
}

export interface ObjectStats {
  commonObjects: ObjectCount[];
  distanceDistribution: Array<{ distanceCategory: string; count: number }>;
  directionDistribution: Array<{ direction: string; count: number }>;
}

export interface Timeline {
  detections: Array<{ hour: string; count: number }>;
  alerts: Array<{ hour: string; distanceCategory: AlertSeverity; count: number }>;
}

export interface SafetyMetrics {
  criticalAlerts24h: number;
  warningAlerts24h: number;
  safetyAlerts24h: number;
  dangerousHours: Array<{ hour: string; count: number }>;
  dangerousObjects: ObjectCount[];
}

export interface SessionExport {
  session: SessionRow;
  detections: DetectionRow[];
  alerts: AlertRow[];
  voiceCommands: VoiceCommandRow[];
  sceneSummaries: SceneSummaryRow[];
}

const insertedId = (row: { id: number } | undefined): number => {
  if (!row) throw new Error('Insert returned no row');
  return row.id;
};

/**
 * Persistence sink and session lifecycle.
 * Writes attach to the open session, opening one when none is open; they never throw.
 * Alert rows are insert-only.
 */
export class DataLogger {
  private current: number | null = null;

  constructor(private readonly db: AppDatabase, private readonly now: () => number = Date.now) {}

  currentSessionId(): number | null {
    return this.current;
  }

  /** Opens a session unless one is open. Null when storage is unavailable. */
  startSession(): number | null {
    return this.write('session start', () => this.openSession());
  }

  /** Finalizes the open session. Closed sessions never reopen. */
  endSession(): SessionRow | null {
    const id = this.current;
    if (id === null) return null;
    this.current = null;
    const session = this.write('session end', () => this.finalize(id, this.now()));
    if (session) log.info(`Session ${id} ended after ${session.durationSeconds ?? 0}s`);
    return session;
  }

  /** Closes sessions left open by a crash, stamping them with their last recorded activity. */
  recoverOpenSessions(): number[] {
    const recovered =
      this.write('session recovery', () => {
        const open = this.db.select().from(sessions).where(isNull(sessions.endTime)).all();
        const closed: number[] = [];
        for (const session of open) {
          if (session.id === this.current) continue;
          this.finalize(session.id, this.lastActivity(session));
          closed.push(session.id);
        }
        return closed;
      }) ?? [];
    if (recovered.length > 0) log.warn(`Closed ${recovered.length} session(s) left open: ${recovered.join(', ')}`);
    return recovered;
  }

  recordDetection(event: ProximityEvent, admitted: boolean): number | null {
    return this.write('detection', () => {
      const sessionId = this.current ?? this.openSession();
      return this.db.transaction((tx) => {
        const row = tx
          .insert(detections)
          .values({
            sessionId,
            timestamp: event.timestamp,
            objectType: event.objectType,
            distanceCategory: event.zone,
            direction: event.direction,
            size: event.size,
            confidence: event.confidence ?? null,
            x1: event.bbox?.x1 ?? null,
            y1: event.bbox?.y1 ?? null,
            x2: event.bbox?.x2 ?? null,
            y2: event.bbox?.y2 ?? null,
            admitted
          })
          .returning({ id: detections.id })
          .get();
        tx.update(sessions)
          .set({ totalDetections: sql`${sessions.totalDetections} + 1` })
          .where(eq(sessions.id, sessionId))
          .run();
        return insertedId(row);
      });
    });
  }

  recordAlert(alert: Alert): number | null {
    return this.write('alert', () => {
      const sessionId = this.current ?? this.openSession();
      const severity = alertSeverity(alert);
      const critical = severity === ProximityZone.CRITICAL ? 1 : 0;
      return this.db.transaction((tx) => {
        const row = tx
          .insert(alerts)
          .values({
            sessionId,
            timestamp: alert.createdAt,
            category: alert.kind,
            distanceCategory: severity,
            objectType: alert.kind === 'safety' ? alert.transition.event.type : alert.event.objectType,
            direction: alert.kind === 'safety' ? null : alert.event.direction,
            alertText: alert.message
          })
          .returning({ id: alerts.id })
          .get();
        tx.update(sessions)
          .set({
            totalAlerts: sql`${sessions.totalAlerts} + 1`,
            criticalAlerts: sql`${sessions.criticalAlerts} + ${critical}`
          })
          .where(eq(sessions.id, sessionId))
          .run();
        return insertedId(row);
      });
    });
  }

  logVoiceCommand(command: string, response: string): number | null {
    return this.write('voice command', () => {
      const sessionId = this.current ?? this.openSession();
      const row = this.db
        .insert(voiceCommands)
        .values({ sessionId, timestamp: this.now(), command, response })
        .returning({ id: voiceCommands.id })
        .get();
      return insertedId(row);
    });
  }

  logSceneSummary(summaryText: string, objectCount: number): number | null {
    return this.write('scene summary', () => {
      const sessionId = this.current ?? this.openSession();
      const row = this.db
        .insert(sceneSummaries)
        .values({ sessionId, timestamp: this.now(), summaryText, objectCount })
        .returning({ id: sceneSummaries.id })
        .get();
      return insertedId(row);
    });
  }

  // --- reads ---

  getRecentAlerts(limit = 50): AlertRow[] {
    return this.db.select().from(alerts).orderBy(desc(alerts.timestamp), desc(alerts.id)).limit(limit).all();
  }

  getAllSessions(): SessionRow[] {
    return this.db.select().from(sessions).orderBy(desc(sessions.startTime), desc(sessions.id)).all();
  }

  getSession(id: number): SessionRow | null {
    return this.db.select().from(sessions).where(eq(sessions.id, id)).get() ?? null;
  }

  getSessionStats(id: number): SessionDetails | null {
    const session = this.getSession(id);
    if (!session) return null;

    const objectDistribution = this.db
      .select({ objectType: detections.objectType, count: count() })
      .from(detections)
      .where(eq(detections.sessionId, id))
      .groupBy(detections.objectType)
      .orderBy(desc(count()), asc(detections.objectType))
      .all();

    const alertTimeline = this.db
      .select({
        timestamp: alerts.timestamp,
        objectType: alerts.objectType,
        distanceCategory: alerts.distanceCategory,
        direction: alerts.direction
      })
      .from(alerts)
      .where(eq(alerts.sessionId, id))
      .orderBy(asc(alerts.timestamp), asc(alerts.id))
      .all();

    return { ...session, objectDistribution, alertTimeline };
  }

  getOverallStats(): OverallStats {
    const row = this.db
      .select({
        totalSessions: count(),
        totalDuration: sql<number>`coalesce(sum(${sessions.durationSeconds}), 0)`.mapWith(Number),
        totalDetections: sql<number>`coalesce(sum(${sessions.totalDetections}), 0)`.mapWith(Number),
        totalAlerts: sql<number>`coalesce(sum(${sessions.totalAlerts}), 0)`.mapWith(Number),
        totalCriticalAlerts: sql<number>`coalesce(sum(${sessions.criticalAlerts}), 0)`.mapWith(Number)
      })
      .from(sessions)
      .get();
    return row ?? { totalSessions: 0, totalDuration: 0, totalDetections: 0, totalAlerts: 0, totalCriticalAlerts: 0 };
  }

  getObjectStats(): ObjectStats {
    const commonObjects = this.db
      .select({ objectType: detections.objectType, count: count() })
      .from(detections)
      .groupBy(detections.objectType)
      .orderBy(desc(count()), asc(detections.objectType))
      .limit(10)
      .all();

    const distanceDistribution = this.db
      .select({ distanceCategory: detections.distanceCategory, count: count() })
      .from(detections)
      .groupBy(detections.distanceCategory)
      .orderBy(asc(detections.distanceCategory))
      .all();

    const directionDistribution = this.db
      .select({ direction: detections.direction, count: count() })
      .from(detections)
      .groupBy(detections.direction)
      .orderBy(asc(detections.direction))
      .all();

    return { commonObjects, distanceDistribution, directionDistribution };
  }

  /** Hourly buckets (local time) over the last `hours` hours. */
  getTimeline(hours = 24): Timeline {
    const cutoff = this.now() - hours * HOUR_MS;

    const detectionTimes = this.db
      .select({ timestamp: detections.timestamp })
      .from(detections)
      .where(gt(detections.timestamp, cutoff))
      .orderBy(asc(detections.timestamp))
      .all();

    const detectionBuckets = new Map<string, number>();
    for (const { timestamp } of detectionTimes) {
      const hour = format(timestamp, HOUR_BUCKET_FORMAT);
      detectionBuckets.set(hour, (detectionBuckets.get(hour) ?? 0) + 1);
    }

    const alertRows = this.db
      .select({ timestamp: alerts.timestamp, distanceCategory: alerts.distanceCategory })
      .from(alerts)
      .where(gt(alerts.timestamp, cutoff))
      .orderBy(asc(alerts.timestamp))
      .all();

    const alertBuckets = new Map<string, { hour: string; distanceCategory: AlertSeverity; count: number }>();
    for (const row of alertRows) {
      const hour = format(row.timestamp, HOUR_BUCKET_FORMAT);
      const key = `${hour}|${row.distanceCategory}`;
      const bucket = alertBuckets.get(key);
      if (bucket) bucket.count += 1;
      else alertBuckets.set(key, { hour, distanceCategory: row.distanceCategory, count: 1 });
    }

    return {
      detections: [...detectionBuckets].map(([hour, total]) => ({ hour, count: total })),
      alerts: [...alertBuckets.values()]
    };
  }

  getSafetyMetrics(): SafetyMetrics {
    const cutoff = this.now() - 24 * HOUR_MS;
    const countSince = (severity: AlertSeverity) =>
      this.db
        .select({ count: count() })
        .from(alerts)
        .where(and(eq(alerts.distanceCategory, severity), gt(alerts.timestamp, cutoff)))
        .get()?.count ?? 0;

    const riskyTimes = this.db
      .select({ timestamp: alerts.timestamp })
      .from(alerts)
      .where(inArray(alerts.distanceCategory, ['critical', 'warning']))
      .all();
    const byHour = new Map<string, number>();
    for (const { timestamp } of riskyTimes) {
      const hour = format(timestamp, 'HH');
      byHour.set(hour, (byHour.get(hour) ?? 0) + 1);
    }
    const dangerousHours = [...byHour]
      .map(([hour, total]) => ({ hour, count: total }))
      .sort((a, b) => b.count - a.count || a.hour.localeCompare(b.hour))
      .slice(0, 5);

    const dangerousObjects = this.db
      .select({ objectType: alerts.objectType, count: count() })
      .from(alerts)
      .where(eq(alerts.distanceCategory, 'critical'))
      .groupBy(alerts.objectType)
      .orderBy(desc(count()), asc(alerts.objectType))
      .limit(5)
      .all();

    return {
      criticalAlerts24h: countSince('critical'),
      warningAlerts24h: countSince('warning'),
      safetyAlerts24h: countSince('safety'),
      dangerousHours,
      dangerousObjects
    };
  }

  getVoiceCommands(limit = 50): VoiceCommandRow[] {
    return this.db
      .select()
      .from(voiceCommands)
      .orderBy(desc(voiceCommands.timestamp), desc(voiceCommands.id))
      .limit(limit)
      .all();
  }

  exportSession(id: number): SessionExport | null {
    const session = this.getSession(id);
    if (!session) return null;
    return {
      session,
      detections: this.db.select().from(detections).where(eq(detections.sessionId, id)).orderBy(asc(detections.id)).all(),
      alerts: this.db.select().from(alerts).where(eq(alerts.sessionId, id)).orderBy(asc(alerts.id)).all(),
      voiceCommands: this.db
        .select()
        .from(voiceCommands)
        .where(eq(voiceCommands.sessionId, id))
        .orderBy(asc(voiceCommands.id))
        .all(),
      sceneSummaries: this.db
        .select()
        .from(sceneSummaries)
        .where(eq(sceneSummaries.sessionId, id))
        .orderBy(asc(sceneSummaries.id))
        .all()
    };
  }

  private finalize(id: number, endTime: number): SessionRow | null {
    const session = this.getSession(id);
    if (!session) return null;

    // Counters are recomputed from the rows so a crashed session ends consistent.
    const totalDetections =
      this.db.select({ count: count() }).from(detections).where(eq(detections.sessionId, id)).get()?.count ?? 0;
    const totalAlerts = this.db.select({ count: count() }).from(alerts).where(eq(alerts.sessionId, id)).get()?.count ?? 0;
    const criticalAlerts =
      this.db
        .select({ count: count() })
        .from(alerts)
        .where(and(eq(alerts.sessionId, id), eq(alerts.distanceCategory, 'critical')))
        .get()?.count ?? 0;

    const end = Math.max(endTime, session.startTime);
    this.db
      .update(sessions)
      .set({
        endTime: end,
        durationSeconds: (end - session.startTime) / 1000,
        totalDetections,
        totalAlerts,
        criticalAlerts
      })
      .where(eq(sessions.id, id))
      .run();
    return this.getSession(id);
  }

  private lastActivity(session: SessionRow): number {
    const lastDetection = this.db
      .select({ latest: sql<number | null>`max(${detections.timestamp})` })
      .from(detections)
      .where(eq(detections.sessionId, session.id))
      .get()?.latest;
    const lastAlert = this.db
      .select({ latest: sql<number | null>`max(${alerts.timestamp})` })
      .from(alerts)
      .where(eq(alerts.sessionId, session.id))
      .get()?.latest;
    return Math.max(session.startTime, lastDetection ?? 0, lastAlert ?? 0);
  }

  private openSession(): number {
    if (this.current !== null) return this.current;
    const row = this.db.insert(sessions).values({ startTime: this.now() }).returning({ id: sessions.id }).get();
    this.current = insertedId(row);
    log.info(`Session ${this.current} started`);
    return this.current;
  }

  private write<T>(label: string, operation: () => T): T | null {
    try {
      return operation();
    } catch (error) {
      log.error(`Failed to record ${label}`, error);
      return null;
    }
  }
}
