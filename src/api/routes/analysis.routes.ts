/**
 * Analysis routes
 */

import { Router } from 'express';
import { AnalysisController } from '../controllers/analysis.controller.js';

export function createAnalysisRouter(controller: AnalysisController): Router {
  const router = Router();

  // Single evaluation of a position
  router.post('/evaluate', (req, res) => controller.evaluate(req, res));

  // Top-k candidate moves
  router.post('/suggestions', (req, res) => controller.suggestions(req, res));

  // Was the played move a blunder?
  router.post('/blunder', (req, res) => controller.blunder(req, res));

  // Every legal move that would be a blunder
  router.post('/blunders/scan', (req, res) => controller.scan(req, res));

  router.post('/state', (req, res) => controller.state(req, res));

  // Evaluation, breakdown, state and suggestions in one call
  router.post('/position', (req, res) => controller.position(req, res));

  return router;
}
