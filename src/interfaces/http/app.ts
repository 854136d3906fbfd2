/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * Returns a new app per call: each cluster worker builds its own, and
 * integration tests get a fresh one after overriding container registrations.
 *
 * Middleware order:
 *   1. requestTimer  — stamps req.requestStartTime for totalTimeMs.
 *   2. helmet()      — security headers.
 *   3. cors()        — cross-origin access for browser clients.
 *   4. compression() — gzip; catalog payloads are verbose JSON.
 *   5. requestLogger — pino-http, one line per response.
 *   6. Routes.
 *   7. errorHandler  — last; turns thrown AppErrors into JSON responses.
 *
 * The side-effect `import '@core/container'` bootstraps the DI container
 * before any controller resolves from it.
 */
import '@core/container';

import { errorHandler } from '@interfaces/http/middleware/errorHandler';
import { requestLogger } from '@interfaces/http/middleware/requestLogger';
import { requestTimer } from '@interfaces/http/middleware/requestTimer';
import { catalogRoutes } from '@interfaces/http/routes/catalogRoutes';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

export function createApp(): express.Express {
  const app = express();

  app.use(requestTimer);

  app.use(helmet());
  app.use(cors({ methods: ['GET'] }));
  app.use(compression());

  app.use(requestLogger);

  app.use('/api/v1', healthRoutes);
  app.use('/api/v1/catalog', catalogRoutes);

  app.use(errorHandler);

  return app;
}
