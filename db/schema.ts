import { sqliteTable, integer, text, real } from 'drizzle-orm/sqlite-core';

// All timestamps are ms epoch integers.

export const sessions = sqliteTable('sessions', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  startTime: integer('start_time').notNull(),
  endTime: integer('end_time'),
  durationSeconds: real('duration_seconds'),
  totalDetections: integer('total_detections').notNull().default(0),
  totalAlerts: integer('total_alerts').notNull().default(0),
  criticalAlerts: integer('critical_alerts').notNull().default(0),
});

export const detections = sqliteTable('detections', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  sessionId: integer('session_id').notNull().references(() => sessions.id),
  timestamp: integer('timestamp').notNull(),
  objectType: text('object_type').notNull(),
  distanceCategory: text('distance_category').notNull(),
  direction: text('direction').notNull(),
  size: real('size').notNull(),
  confidence: real('confidence'),
  x1: real('x1'),
  y1: real('y1'),
  x2: real('x2'),
  y2: real('y2'),
  admitted: integer('admitted', { mode: 'boolean' }).notNull(),
});

export const alerts = sqliteTable('alerts', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  sessionId: integer('session_id').notNull().references(() => sessions.id),
  timestamp: integer('timestamp').notNull(),
  category: text('category', { enum: ['proximity', 'safety'] }).notNull(),
  distanceCategory: text('distance_category', { enum: ['critical', 'warning', 'far', 'safety'] }).notNull(),
  objectType: text('object_type').notNull(),
  direction: text('direction'),
  alertText: text('alert_text').notNull(),
});

export const voiceCommands = sqliteTable('voice_commands', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  sessionId: integer('session_id').notNull().references(() => sessions.id),
  timestamp: integer('timestamp').notNull(),
  command: text('command').notNull(),
  response: text('response').notNull(),
});

export const sceneSummaries = sqliteTable('scene_summaries', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  sessionId: integer('session_id').notNull().references(() => sessions.id),
  timestamp: integer('timestamp').notNull(),
  summaryText: text('summary_text').notNull(),
  objectCount: integer('object_count').notNull(),
});

export type SessionRow = typeof sessions.$inferSelect;
export type DetectionRow = typeof detections.$inferSelect;
export type DetectionInsert = typeof detections.$inferInsert;
export type AlertRow = typeof alerts.$inferSelect;
export type AlertInsert = typeof alerts.$inferInsert;
export type VoiceCommandRow = typeof voiceCommands.$inferSelect;
export type SceneSummaryRow = typeof sceneSummaries.$inferSelect;
