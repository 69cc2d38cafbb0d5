import { Router } from 'express';
import type { SessionRegistry } from '../calls/sessionRegistry';

export interface HealthSource {
  registry: Pick<SessionRegistry, 'count'>;
  isServing: boolean;
}

export function createHealthRouter(source: HealthSource): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.status(source.isServing ? 200 : 503).json({
      status: source.isServing ? 'ok' : 'starting',
      sessions: {
        voice: source.registry.count('voice'),
        text: source.registry.count('text'),
      },
    });
  });

  return router;
}
