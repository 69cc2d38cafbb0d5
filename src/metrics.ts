import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client from 'prom-client';

/**
 * Runtime Prometheus metrics
 *
 * prom-client Histogram.startTimer() measures SECONDS; the *_ms histograms
 * below are observed with true milliseconds instead.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'pbx_dialog_runtime_';

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (Express)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000],
  registers: [register],
});

const sessionsActive = new client.Gauge({
  name: `${METRICS_PREFIX}sessions_active`,
  help: 'Sessions currently held by the registry',
  labelNames: ['kind'] as const,
  registers: [register],
});

const sessionsEndedTotal = new client.Counter({
  name: `${METRICS_PREFIX}sessions_ended_total`,
  help: 'Sessions that reached ENDED',
  labelNames: ['kind', 'reason'] as const,
  registers: [register],
});

const pbxEventsTotal = new client.Counter({
  name: `${METRICS_PREFIX}pbx_events_total`,
  help: 'Normalized PBX events by kind',
  labelNames: ['source', 'kind'] as const,
  registers: [register],
});

const pbxEventsDroppedTotal = new client.Counter({
  name: `${METRICS_PREFIX}pbx_events_dropped_total`,
  help: 'Raw or routed PBX events that were discarded',
  labelNames: ['source', 'reason'] as const,
  registers: [register],
});

const operationDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}operation_duration_ms`,
  help: 'Time a session spent suspended in an interaction primitive',
  labelNames: ['operation', 'outcome'] as const,
  buckets: [10, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000, 60000],
  registers: [register],
});

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

// Keep route labels low-cardinality
function getRouteLabel(req: Request): string {
  const routePath: unknown = req.route?.path;
  if (typeof routePath === 'string') {
    return req.baseUrl ? `${req.baseUrl}${routePath}` : routePath;
  }

  const raw = req.path || req.url || 'unknown';
  return raw
    .replace(/\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi, ':uuid')
    .replace(/\b\d{6,}\b/g, ':n');
}

export const metricsMiddleware: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
  const start = nowNs();

  res.on('finish', () => {
    try {
      httpRequestDurationMs.observe(
        {
          method: req.method,
          route: getRouteLabel(req),
          code: String(res.statusCode),
        },
        nsToMs(nowNs() - start),
      );
    } catch {
      // never break requests due to metrics
    }
  });

  next();
};

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
}

export function setSessionsActive(kind: string, count: number): void {
  sessionsActive.set({ kind }, count);
}

export function incSessionsEnded(kind: string, reason: string): void {
  sessionsEndedTotal.inc({ kind, reason: reason.trim() !== '' ? reason : 'unknown' });
}

export function incPbxEvent(source: string, kind: string): void {
  pbxEventsTotal.inc({ source, kind });
}

export function incPbxEventDropped(source: string, reason: string): void {
  pbxEventsDroppedTotal.inc({ source, reason: reason.trim() !== '' ? reason : 'unknown' });
}

/**
 * Starts an operation timer and returns an end(outcome) function.
 */
export function startOperationTimer(operation: string): (outcome: string) => void {
  const start = nowNs();

  return (outcome: string) => {
    try {
      operationDurationMs.observe({ operation, outcome }, nsToMs(nowNs() - start));
    } catch {
      // swallow
    }
  };
}
