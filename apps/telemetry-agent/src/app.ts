import express from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import { createServer } from 'http';
import type { Server } from 'http';

import type { StatusSource } from './agent.js';
import { createStatusRouter } from './controllers/status.controller.js';
import { errorHandler } from './middleware/error-handler.js';

export interface StatusAppOptions {
  /** morgan format; `null` turns request logging off */
  requestLog?: string | null;
}

export function buildStatusApp(source: StatusSource, options: StatusAppOptions = {}): ReturnType<typeof express> {
  const app = express();

  // ─── Middleware ─────────────────────────────────────────────────────────────
  app.use(helmet());
  const requestLog = options.requestLog === undefined ? 'combined' : options.requestLog;
  if (requestLog) app.use(morgan(requestLog));
  app.use(express.json({ limit: '100kb' }));

  // ─── Routes ─────────────────────────────────────────────────────────────────
  app.use('/api', createStatusRouter(source));

  app.get('/healthz', (_req, res) => {
    res.json({
      status: 'ok',
      ts: new Date().toISOString(),
      running: source.status().running,
    });
  });

  // ─── Error handler (must be last) ───────────────────────────────────────────
  app.use(errorHandler);

  return app;
}

export function buildHttpServer(app: ReturnType<typeof express>): Server {
  return createServer(app);
}
