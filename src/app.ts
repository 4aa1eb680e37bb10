import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { correlationMiddleware } from './api/middleware/correlation.middleware.js';
import { errorHandler, notFoundHandler } from './api/middleware/error.handler.js';
import { requestLoggerMiddleware } from './api/middleware/request-logger.middleware.js';
import { createRequestRecorder, type RequestLog } from './api/middleware/request-recorder.middleware.js';
import { createStatusRouter, type StatusRouterOptions } from './api/routes/status/index.js';
import type { StatusRouteDependencies } from './api/routes/status/status.types.js';

export interface AppDependencies extends StatusRouteDependencies {
  /** Audit table for served requests; omitted when there is no database */
  requestLog?: RequestLog;
  /** Browser origins allowed to call the JSON endpoints cross-origin */
  allowedOrigins?: string[];
  routes?: StatusRouterOptions;
}

/**
 * Build the Express application
 *
 * Pure wiring: every collaborator comes in through `deps`, so tests build the
 * app around in-process fakes and the server entry point around real pools.
 */
export function createApp(deps: AppDependencies): express.Express {
  const app = express();
  const allowedOrigins = deps.allowedOrigins ?? [];

  // Behind the compose nginx proxy; trust only private-network hops for req.ip
  app.set('trust proxy', 'loopback, linklocal, uniquelocal');
  app.disable('x-powered-by');

  app.use(helmet({
    // The dashboard ships inline styles and one inline script
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'", "'unsafe-inline'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        connectSrc: ["'self'"],
        imgSrc: ["'self'", 'data:']
      }
    },
    noSniff: true
  }));

  app.use(cors({
    origin: (origin, callback) => {
      // Same-origin requests, curl and health probes send no Origin header
      if (!origin) {
        return callback(null, true);
      }
      callback(null, allowedOrigins.includes(origin));
    }
  }));

  app.use(correlationMiddleware);
  app.use(requestLoggerMiddleware);
  app.use(createRequestRecorder({
    counter: deps.counters.requests,
    requestLog: deps.requestLog,
    timeoutMs: deps.healthCheck.getConfig().timeoutMs
  }));

  app.use(createStatusRouter(deps, deps.routes));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
