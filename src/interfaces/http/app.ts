/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * Returns a new app per call: each cluster worker builds its own, and
 * integration tests build one after overriding container registrations.
 *
 * Middleware order:
 *   1. requestTimer   - stamps req.requestStartTime.
 *   2. helmet()       - security headers (the web form only loads same-origin
 *                       script and style, so the default CSP holds).
 *   3. cors()
 *   4. compression()
 *   5. express.json()
 *   6. requestLogger
 *   7. static web form from /public
 *   8. API routes under /api
 *   9. notFoundHandler, then errorHandler (last).
 */
import '@core/container';

import path from 'node:path';

import { errorHandler, notFoundHandler } from '@interfaces/http/middleware/errorHandler';
import { requestLogger } from '@interfaces/http/middleware/requestLogger';
import { requestTimer } from '@interfaces/http/middleware/requestTimer';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import { lookupRoutes } from '@interfaces/http/routes/lookupRoutes';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

const PUBLIC_DIR = path.resolve(__dirname, '../../../public');

export function createApp(): express.Express {
  const app = express();

  app.use(requestTimer);

  app.use(helmet());
  app.use(cors());
  app.use(compression());

  app.use(express.json());

  app.use(requestLogger);

  app.use(express.static(PUBLIC_DIR));

  app.use('/api', healthRoutes);
  app.use('/api', lookupRoutes);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
