/**
 * kpi-service - Express App Factory
 * Creates the Express app instance without starting the server, for tests and main.ts
 */

import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import {
  errorHandler,
  initResponseHelpers,
  isProduction,
  notFoundHandler,
  requestLogger,
} from '@netkpi/platform-core';
import { getServiceRegistry, type KpiServiceRegistry } from './infrastructure/ServiceFactory';
import { setupRoutes } from './presentation/routes';
import { SERVICE_NAME } from './config/service-urls';

export function createApp(registry: KpiServiceRegistry = getServiceRegistry()): express.Express {
  initResponseHelpers(SERVICE_NAME);

  const app = express();

  setupMiddleware(app);
  setupRoutes(app, registry);
  setupErrorHandling(app);

  return app;
}

function setupMiddleware(app: express.Express): void {
  app.use(
    helmet({
      contentSecurityPolicy: false,
      crossOriginEmbedderPolicy: false,
    })
  );

  app.use(compression());

  // Comma-separated; unset means any origin outside production
  const corsOrigins = process.env.CORS_ALLOWED_ORIGINS
    ? process.env.CORS_ALLOWED_ORIGINS.split(',').map(o => o.trim())
    : !isProduction();

  app.use(
    cors({
      origin: corsOrigins,
      credentials: true,
    })
  );

  const limiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: isProduction() ? 1000 : 10000,
    message: 'Too many requests from this IP, please try again later.',
    standardHeaders: true,
  });
  app.use('/api/', limiter);

  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger(SERVICE_NAME));
}

function setupErrorHandling(app: express.Express): void {
  app.use(notFoundHandler());
  app.use(errorHandler());
}
