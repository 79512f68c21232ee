/**
 * Health Check Route
 * Layer: Interfaces (HTTP)
 *
 *   GET /api/health  →  { status: 'ok', uptime: 123.4, timestamp: '...' }
 *
 * Liveness only. It does not call the registry, so an upstream outage does
 * not take the instance out of rotation (lookups degrade to empty results).
 */
import { Router } from 'express';

const router = Router();

router.get('/health', (_req, res) => {
  res.status(200).json({
    status: 'ok',
    uptime: process.uptime(),
    timestamp: new Date().toISOString(),
  });
});

export { router as healthRoutes };
