/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * Returns a new app instance rather than a singleton, so integration tests
 * get a fresh app after overriding container registrations.
 *
 * Middleware ordering matters — it's an assembly line:
 *   1. requestTimer  — Records req.requestStartTime for totalTimeMs in responses.
 *   2. helmet()      — Security headers.
 *   3. cors()        — Cross-origin requests.
 *   4. compression() — Gzip response bodies.
 *   5. express.json()— Parses JSON request bodies into req.body.
 *   6. requestLogger — Logs every request/response with timing.
 *   7. Routes
 *   8. errorHandler  — MUST be last.
 *
 * The `import '@core/container'` side-effect import bootstraps the DI
 * container before any route resolves a service from it.
 */
import '@core/container';

import { errorHandler } from '@interfaces/http/middleware/errorHandler';
import { requestLogger } from '@interfaces/http/middleware/requestLogger';
import { requestTimer } from '@interfaces/http/middleware/requestTimer';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import { createIngestionRoutes } from '@interfaces/http/routes/ingestionRoutes';
import { createMatchRoutes } from '@interfaces/http/routes/matchRoutes';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

export function createApp(): express.Express {
  const app = express();

  // Request timing (must be first)
  app.use(requestTimer);

  // Security & compression
  app.use(helmet());
  app.use(cors());
  app.use(compression());

  // Body parsing
  app.use(express.json());

  // Request logging
  app.use(requestLogger);

  // Routes
  app.use('/api/v1', healthRoutes);
  app.use('/api/v1/matches', createMatchRoutes());
  app.use('/api/v1', createIngestionRoutes());

  // Global error handler (must be registered last)
  app.use(errorHandler);

  return app;
}
