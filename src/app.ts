import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import path from 'path';
import { fileURLToPath } from 'url';
import type { AppConfig } from './config/index.js';
import { BackendClient } from './clients/backendClient.js';
import { DashboardService } from './shared/services/dashboard.service.js';
import { dashboardRouter } from './routes/dashboard.js';
import { healthRouter } from './routes/health.js';
import { notFoundHandler, errorHandler } from './middleware/errorHandler.js';
import { logger } from './utils/logger.js';

// src/ and dist/ both sit one level below the project root
const PUBLIC_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', 'public');

export interface AppDeps {
  config: Pick<AppConfig, 'backend' | 'defaultSymbol'>;
  backend?: BackendClient;
}

export function createApp({ config, backend = new BackendClient(config.backend) }: AppDeps) {
  const app = express();
  const dashboard = new DashboardService(backend, config.defaultSymbol);

  // Inline chart iframe comes from a third-party origin
  app.use(helmet({ contentSecurityPolicy: false, crossOriginEmbedderPolicy: false }));
  app.use(compression());
  app.use((req, res, next) => {
    const start = Date.now();
    res.on('finish', () => {
      logger.info({ method: req.method, url: req.originalUrl, status: res.statusCode, ms: Date.now() - start }, 'http_request');
    });
    next();
  });

  app.use(express.static(PUBLIC_DIR, { index: false }));
  app.use('/api', cors());
  app.use(healthRouter(backend));
  app.use(dashboardRouter(dashboard, backend.baseUrl));

  app.use(notFoundHandler);
  app.use(errorHandler);
  return app;
}
