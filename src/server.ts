import type { Server } from 'node:http';
import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import { createLogger, generateRequestId } from './utils/logger.js';
import type { NotesService } from './core/notes/NotesService.js';
import { createNotesRouter } from './adapters/http/notesRouter.js';
import type { NotesRouterOptions } from './adapters/http/notesRouter.js';

const logger = createLogger({ component: 'server' });

export type AppOptions = NotesRouterOptions;

export function errorHandler(err: Error, _req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    next(err);
    return;
  }
  logger.error({ error: err }, 'Unhandled error in Express');
  const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
  res.status(status).json({ error: status === 500 ? 'Internal server error' : err.message });
}

export function createApp(service: NotesService, options: AppOptions = {}): Express {
  const app = express();

  // strict: false so a bare JSON string is accepted as a note body
  const jsonBody = express.json({ limit: '1mb', strict: false });
  app.use((req, res, next) => {
    if (req.path === '/upload') {
      next();
      return;
    }
    jsonBody(req, res, next);
  });

  app.use((req, res, next) => {
    const requestId = generateRequestId();
    const started = Date.now();
    res.setHeader('X-Request-Id', requestId);
    logger.info({ requestId, method: req.method, path: req.path }, 'Incoming request');
    res.on('finish', () => {
      logger.info({ requestId, status: res.statusCode, durationMs: Date.now() - started }, 'Request completed');
    });
    next();
  });

  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(createNotesRouter(service, options));
  app.use(errorHandler);

  return app;
}

export async function startServer(
  service: NotesService,
  port: number,
  host: string = '127.0.0.1',
  options: AppOptions = {}
): Promise<Server> {
  const app = createApp(service, options);

  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => {
      logger.info({ host, port }, 'HTTP server started');
      resolve(server);
    });
    server.once('error', reject);
  });
}
