/**
 * Status Routes
 *
 * GET /               - HTML dashboard
 * GET /health         - machine health document (orchestrator probe target)
 * GET /info           - runtime and host information
 * GET /api/test-db    - exercise the database on demand
 * GET /api/test-cache - exercise the cache on demand
 * GET /api/stats      - health document merged with the metrics snapshot
 *
 * The two exercise routes write to the dependencies, so they carry a per-IP
 * rate limit. The others are read-only.
 */

import { Router } from 'express';
import rateLimit from 'express-rate-limit';
import { ApiError, asyncHandler } from '../../middleware/error.handler.js';
import { createStatusController } from './status.controller.js';
import type { StatusRouteDependencies } from './status.types.js';

export interface StatusRouterOptions {
  /** Requests per minute per IP on /api/test-* (default: 60) */
  exerciseRateLimit?: number;
}

export function createStatusRouter(
  deps: StatusRouteDependencies,
  options: StatusRouterOptions = {}
): Router {
  const router = Router();
  const controller = createStatusController(deps);

  const exerciseLimiter = rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max: options.exerciseRateLimit ?? 60,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, res) => {
      const error = ApiError.rateLimited();
      res.status(error.statusCode).json(error.toJSON());
    }
  });

  router.get('/', asyncHandler(controller.dashboard));
  router.get('/health', asyncHandler(controller.health));
  router.get('/info', asyncHandler(controller.info));
  router.get('/api/test-db', exerciseLimiter, asyncHandler(controller.testDatabase));
  router.get('/api/test-cache', exerciseLimiter, asyncHandler(controller.testCache));
  router.get('/api/stats', asyncHandler(controller.stats));

  return router;
}
