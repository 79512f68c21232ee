/**
 * HTTP Request Logger Middleware
 * Layer: Interfaces (HTTP)
 *
 * Pino's HTTP plugin on the shared logger: one line per response with
 * method, URL, status and response time. Health probes are not logged.
 */
import { logger } from '@core/logger';
import pinoHttp from 'pino-http';

export const requestLogger = pinoHttp({
  logger,
  autoLogging: {
    ignore: (req) => req.url === '/api/health',
  },
});
