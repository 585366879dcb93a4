import express, { Express, Request, Response, NextFunction } from 'express';
import { register as metricsRegister, recordHttpRequest } from './utils/metrics';
import { loggers } from './utils/logger';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createControlRouter } from './routes/controlRoutes';
import { createStatusRouter, StatusRouterDeps } from './routes/statusRoutes';

const log = loggers.app;

/**
 * HTTP control surface: status reads, queued control actions and /metrics
 */
export function createApp(deps: StatusRouterDeps): Express {
  const app = express();

  // Pretty-print JSON responses
  app.enable('json spaces');
  app.set('etag', false);
  app.use(express.json());

  // HTTP request metrics middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on('finish', () => {
      const route: unknown = req.route?.path;
      recordHttpRequest(typeof route === 'string' ? route : req.path, req.method, res.statusCode, Date.now() - start);
    });
    next();
  });

  // Disable caching for API routes
  app.use('/api', (_req: Request, res: Response, next: NextFunction) => {
    res.set('Cache-Control', 'no-store, no-cache, must-revalidate, private');
    next();
  });

  app.use('/api', createStatusRouter(deps));
  app.use('/api/control', createControlRouter(deps.queue));

  // Prometheus Metrics Endpoint
  app.get('/metrics', async (_req: Request, res: Response) => {
    try {
      res.set('Content-Type', metricsRegister.contentType);
      res.end(await metricsRegister.metrics());
    } catch (error) {
      log.error('Error generating metrics', error);
      res.status(500).send('Error generating metrics');
    }
  });

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
