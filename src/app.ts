/**
 * Express application setup
 */

import express from 'express';
import helmet from 'helmet';
import { createCorsMiddleware } from './api/middleware/cors.middleware.js';
import { errorHandler } from './api/middleware/errorHandler.js';
import { AnalysisController } from './api/controllers/analysis.controller.js';
import { createApiRouter } from './api/routes/index.js';
import type { ModelRegistry } from './engine/ModelRegistry.js';
import type { PositionAnalysisService } from './services/PositionAnalysisService.js';
import { logger } from './utils/logger.js';

export interface AppOptions {
  service?: PositionAnalysisService;
  registry?: ModelRegistry;
  allowedOrigins?: readonly string[];
}

export function createApp(options: AppOptions = {}): express.Express {
  const app = express();

  // Security headers
  app.use(helmet());

  // CORS
  app.use(createCorsMiddleware(options.allowedOrigins));

  // Body parsing
  app.use(express.json({ limit: '1mb' }));

  // Request logging
  app.use((req, res, next) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.info(
        {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          duration: `${duration}ms`,
        },
        'Request completed'
      );
    });

    next();
  });

  // API routes
  app.use('/api/v1', createApiRouter(new AnalysisController(options.service), options.registry));

  // Root endpoint
  app.get('/', (_req, res) => {
    res.json({
      name: 'Chess Position Advisor API',
      version: '1.0.0',
      status: 'running',
    });
  });

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found', code: 'NOT_FOUND' });
  });

  // Global error handler
  app.use(errorHandler);

  return app;
}
