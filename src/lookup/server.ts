/**
 * Lookup Server
 *
 * Express app exposing a corpus to research tools:
 *
 *   GET /api/health       - liveness
 *   GET /api/search?q=    - up to 20 matching rows
 *   GET /api/fetch/:id    - one full document
 *
 * @module lookup/server
 */

import express, { type Application, type NextFunction, type Request, type Response } from 'express';
import type { Server } from 'node:http';
import { z } from 'zod';
import { silentLogger, type Logger } from '../pipeline/types.js';
import type { CorpusIndex } from './corpus.js';
import { createErrorHandler, notFoundHandler, requireBearer } from './middleware.js';

export interface LookupServerOptions {
  /** Required bearer token; open when unset */
  apiToken?: string;
  logger?: Logger;
}

const SearchQuerySchema = z.object({
  q: z.string({ required_error: 'q is required' }),
});

const FetchParamsSchema = z.object({
  id: z.string().min(1),
});

/**
 * Create the lookup app over an index.
 */
export function createApp(index: CorpusIndex, options: LookupServerOptions = {}): Application {
  const logger = options.logger ?? silentLogger;
  const app = express();

  app.use(requireBearer(options.apiToken));

  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({
      ok: true,
      status: 'healthy',
      records: index.size,
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/api/search', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { q } = SearchQuerySchema.parse(req.query);
      const results = index.search(q);
      logger.debug(`search "${q}": ${results.length} results`);
      res.json({ ok: true, results });
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/fetch/:id', (req: Request, res: Response, next: NextFunction) => {
    try {
      const { id } = FetchParamsSchema.parse(req.params);
      res.json({ ok: true, document: index.fetch(id) });
    } catch (error) {
      next(error);
    }
  });

  app.use('/api/*', notFoundHandler);
  app.use(createErrorHandler(logger));

  return app;
}

/**
 * Listen on `port`, resolving once the socket is bound.
 */
export function startServer(app: Application, port: number): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => resolve(server));
    server.once('error', reject);
  });
}
