import { Router, Request, Response } from 'express';
import type { TimelineSessionStore } from '../services/sessionStore.js';

export function createHealthRouter(store: TimelineSessionStore): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      sessions: store.size,
    });
  });

  return router;
}
