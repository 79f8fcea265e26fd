/**
 * API routes index
 */

import { Router } from 'express';
import { AnalysisController } from '../controllers/analysis.controller.js';
import { ModelRegistry } from '../../engine/ModelRegistry.js';
import { createHealthRouter } from './health.routes.js';
import { createAnalysisRouter } from './analysis.routes.js';

export function createApiRouter(controller: AnalysisController, registry?: ModelRegistry): Router {
  const router = Router();

  // Mount routes
  router.use('/health', createHealthRouter(registry));
  router.use('/analysis', createAnalysisRouter(controller));

  return router;
}
