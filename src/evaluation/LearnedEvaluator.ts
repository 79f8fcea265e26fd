/**
 * Learned Evaluator
 * Wraps the trained model. Never throws: every failure becomes an
 * `unavailable` prediction the blended evaluator can branch on.
 */

import { getModelRegistry } from '../engine/ModelRegistry.js';
import type { ModelSource } from '../engine/ModelRegistry.js';
import type { FeatureVector, LearnedPrediction } from '../types/index.js';
import { FeatureSchemaMismatchError, toError } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';

const learnedLogger = createChildLogger('LearnedEvaluator');

export class LearnedEvaluator {
  constructor(private readonly models: ModelSource = getModelRegistry()) {}

  predict(features: FeatureVector): LearnedPrediction {
    const state = this.models.getState();

    if (state.status === 'unavailable') {
      return { status: 'unavailable', reason: state.reason, detail: state.detail };
    }
    if (state.status !== 'ready') {
      return { status: 'unavailable', reason: 'not_loaded' };
    }

    try {
      const score = state.model.predict(features);
      if (!Number.isFinite(score)) {
        learnedLogger.warn({ score }, 'Model returned a non-finite score');
        return { status: 'unavailable', reason: 'prediction_failed', detail: `non-finite score ${score}` };
      }
      return { status: 'ok', score };
    } catch (error) {
      const err = toError(error);
      if (err instanceof FeatureSchemaMismatchError) {
        learnedLogger.warn(
          { expected: err.expected, received: err.received },
          'Feature schema mismatch, using heuristic score',
        );
        return { status: 'unavailable', reason: 'schema_mismatch', detail: err.message };
      }
      learnedLogger.warn({ error: err.message }, 'Model prediction failed, using heuristic score');
      return { status: 'unavailable', reason: 'prediction_failed', detail: err.message };
    }
  }
}
