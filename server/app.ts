import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { serverLogger } from '../services/logger.js';
import { DEFAULT_TIMELINE_CONFIG, type TimelineConfig } from '../services/timeline/config.js';
import { createHealthRouter } from './routes/health.js';
import { createTimelineRouter } from './routes/timeline.js';
import { TimelineSessionStore } from './services/sessionStore.js';
import type { ServerContext } from './types.js';
import { sendError } from './utils/httpErrors.js';
import { TEMP_DIR, cleanupSession } from './utils/index.js';

export interface CreateAppOptions {
  store?: TimelineSessionStore;
  workDir?: string;
  config?: TimelineConfig;
}

/**
 * Build the Express application. The listening socket and the eviction
 * timer belong to server/index.ts.
 */
export function createApp(options: CreateAppOptions = {}): Express {
  const workDir = options.workDir ?? TEMP_DIR;
  const context: ServerContext = {
    workDir,
    config: options.config ?? DEFAULT_TIMELINE_CONFIG,
    store: options.store ?? new TimelineSessionStore({
      onEvict: session => cleanupSession(session.sessionId, workDir),
    }),
  };

  const app = express();

  app.use(cors());
  app.use(express.json({ limit: '10mb' }));

  app.use('/api/health', createHealthRouter(context.store));
  app.use('/api/timeline', createTimelineRouter(context));

  // Upload and body-parser failures arrive here
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    sendError(res, error, serverLogger, 'Request');
  });

  return app;
}
