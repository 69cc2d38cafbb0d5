import { randomUUID } from 'crypto';
import express, { NextFunction, Request, Response } from 'express';
import http from 'http';
import { log } from './log';
import { metricsHandler, metricsMiddleware } from './metrics';
import { createHealthRouter, type HealthSource } from './routes/health';

function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const incomingId = req.header('x-request-id');
  const requestId = incomingId && incomingId.trim() !== '' ? incomingId : randomUUID();
  res.setHeader('x-request-id', requestId);
  res.locals.requestId = requestId;
  next();
}

function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  log.error({ err, requestId: res.locals.requestId, path: req.path }, 'unhandled error');
  res.status(500).json({ error: 'internal_server_error' });
}

/** Operational endpoints only: health and Prometheus metrics. */
export function buildHttpServer(source: HealthSource): { app: express.Express; server: http.Server } {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestIdMiddleware);
  app.use(metricsMiddleware);

  app.use('/health', createHealthRouter(source));
  app.get('/metrics', (req, res, next) => {
    metricsHandler(req, res).catch(next);
  });

  app.use(errorHandler);

  const server = http.createServer(app);
  return { app, server };
}
