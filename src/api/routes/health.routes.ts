/**
 * Health check routes
 */

import { Router, Request, Response } from 'express';
import { getModelRegistry, ModelRegistry } from '../../engine/ModelRegistry.js';
import { HealthResponse } from '../../types/index.js';

const startTime = Date.now();

export function createHealthRouter(registry: ModelRegistry = getModelRegistry()): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    const modelStatus = registry.getStatus();

    const response: HealthResponse = {
      // Heuristic-only mode still answers every request
      status: modelStatus.status === 'ready' ? 'healthy' : 'degraded',
      model:
        modelStatus.status === 'ready'
          ? 'ready'
          : modelStatus.status === 'loading'
            ? 'loading'
            : 'unavailable',
      uptime: Math.floor((Date.now() - startTime) / 1000),
      version: '1.0.0',
    };

    if (modelStatus.status === 'uninitialized') {
      response.modelReason = 'not_loaded';
    } else if (modelStatus.reason) {
      response.modelReason = modelStatus.reason;
    }

    res.status(200).json(response);
  });

  // Detailed status for debugging
  router.get('/detailed', (_req: Request, res: Response) => {
    res.json({
      model: registry.getStatus(),
      uptime: Math.floor((Date.now() - startTime) / 1000),
      memory: process.memoryUsage(),
      env: {
        nodeEnv: process.env.NODE_ENV,
        modelPath: process.env.MODEL_PATH,
      },
    });
  });

  return router;
}
