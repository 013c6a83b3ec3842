import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { format } from 'date-fns';
import { SafetyEventType } from '../types';
import { describeError, RequestError } from './errors';
import { createLogger } from './logger';
import { QueryService } from './queryService';

const log = createLogger('API');

export interface AcknowledgeResult {
  changed: boolean;
}

export interface ApiServerDeps {
  query: QueryService;
  acknowledge: (type: SafetyEventType) => AcknowledgeResult;
  now?: () => number;
}

const MAX_LIMIT = 1000;
const MAX_HOURS = 24 * 365;

export function parsePositiveInt(raw: unknown, name: string, fallback: number, max: number): number {
  if (raw === undefined || raw === '') return fallback;
  if (typeof raw !== 'string' || !/^\d+$/.test(raw)) throw new RequestError(`${name} must be a positive integer`);
  const value = Number(raw);
  if (value < 1 || value > max) throw new RequestError(`${name} must be between 1 and ${max}`);
  return value;
}

const sessionIdParam = (req: Request): number => parsePositiveInt(req.params.id, 'session id', 0, Number.MAX_SAFE_INTEGER);

/** Express app for the caregiver dashboard. Read endpoints plus the three idempotent acknowledgements. */
export function createApiServer(deps: ApiServerDeps) {
  const { query } = deps;
  const now = deps.now ?? Date.now;
  const app = express();

  app.use(cors());
  app.disable('x-powered-by');

  app.get('/api/status', (_req, res) => {
    res.json(query.status());
  });

  app.get('/api/health', (_req, res) => {
    res.json(query.health());
  });

  app.get('/api/sessions', (_req, res) => {
    res.json(query.sessions());
  });

  app.get('/api/sessions/:id', (req, res) => {
    const session = query.session(sessionIdParam(req));
    if (!session) throw new RequestError('Session not found', 404);
    res.json(session);
  });

  app.get('/api/sessions/:id/export', (req, res) => {
    const id = sessionIdParam(req);
    const data = query.exportSession(id);
    if (!data) throw new RequestError('Session not found', 404);
    res.attachment(`session_${id}_${format(now(), 'yyyyMMdd_HHmmss')}.json`);
    res.send(JSON.stringify(data, null, 2));
  });

  app.get('/api/alerts/recent', (req, res) => {
    res.json(query.recentAlerts(parsePositiveInt(req.query.limit, 'limit', 50, MAX_LIMIT)));
  });

  app.get('/api/voice_commands', (req, res) => {
    res.json(query.voiceCommands(parsePositiveInt(req.query.limit, 'limit', 50, MAX_LIMIT)));
  });

  app.get('/api/stats/overview', (_req, res) => {
    res.json(query.overview());
  });

  app.get('/api/stats/objects', (_req, res) => {
    res.json(query.objectStats());
  });

  app.get('/api/stats/timeline', (req, res) => {
    res.json(query.timeline(parsePositiveInt(req.query.hours, 'hours', 24, MAX_HOURS)));
  });

  app.get('/api/stats/safety', (_req, res) => {
    res.json(query.safetyMetrics());
  });

  app.get('/api/fall_status', (_req, res) => {
    res.json(query.fallStatus());
  });

  app.get('/api/emergency_status', (_req, res) => {
    res.json(query.emergencyStatus());
  });

  app.get('/api/assistance_status', (_req, res) => {
    res.json(query.assistanceStatus());
  });

  app.get('/api/environmental', (_req, res) => {
    res.json(query.environmental());
  });

  const acknowledgeRoute = (type: SafetyEventType) => (_req: Request, res: Response) => {
    const { changed } = deps.acknowledge(type);
    res.json({ status: 'acknowledged', changed, timestamp: new Date(now()).toISOString() });
  };

  for (const type of Object.values(SafetyEventType)) {
    app.route(`/api/${type}_acknowledge`).get(acknowledgeRoute(type)).post(acknowledgeRoute(type));
  }

  app.use('/api', (_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof RequestError) {
      res.status(error.status).json({ error: error.message });
      return;
    }
    log.error(`Request failed: ${describeError(error)}`);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
