/**
 * ModelRegistry - Owns the process-wide model artifact.
 *
 * The artifact is loaded once at startup and read concurrently afterwards.
 * A missing or incompatible file leaves the registry `unavailable` and the
 * engine running on heuristics; it is never a startup failure.
 */

import { config } from '../config/index.js';
import { FEATURE_NAMES, FEATURE_SCHEMA_VERSION } from '../config/constants.js';
import type { ModelArtifact, ModelUnavailableReason } from '../types/index.js';
import { FeatureSchemaMismatchError, toError } from '../utils/errors.js';
import { createChildLogger } from '../utils/logger.js';
import { loadLinearModel } from './LinearRegressionModel.js';

const registryLogger = createChildLogger('ModelRegistry');

export type ModelState =
  | { status: 'uninitialized' }
  | { status: 'loading' }
  | { status: 'ready'; model: ModelArtifact; source: string }
  | { status: 'unavailable'; reason: Extract<ModelUnavailableReason, 'load_failed' | 'schema_mismatch'>; detail: string };

/**
 * Read side of the registry, as the learned evaluator sees it
 */
export interface ModelSource {
  getState(): ModelState;
}

export type ModelLoader = (modelPath: string) => Promise<ModelArtifact>;

export class ModelRegistry implements ModelSource {
  private state: ModelState = { status: 'uninitialized' };
  private pending: Promise<ModelState> | null = null;

  constructor(
    private readonly modelPath: string = config.modelPath,
    private readonly loader: ModelLoader = loadLinearModel,
  ) {}

  get initialized(): boolean {
    return this.state.status === 'ready' || this.state.status === 'unavailable';
  }

  getState(): ModelState {
    return this.state;
  }

  /**
   * Load the artifact. Concurrent callers share the same load; later calls
   * return the settled state without touching the file again.
   */
  initialize(): Promise<ModelState> {
    if (this.initialized) {
      return Promise.resolve(this.state);
    }
    if (this.pending) {
      return this.pending;
    }

    this.state = { status: 'loading' };
    registryLogger.info({ modelPath: this.modelPath }, 'Loading model artifact');

    const pending = this.load().then((state) => {
      // Ignore loads that were superseded by dispose()
      if (this.pending === pending) {
        this.state = state;
        this.pending = null;
      }
      return state;
    });
    this.pending = pending;
    return pending;
  }

  /**
   * Register an in-memory artifact, bypassing the file loader
   */
  use(model: ModelArtifact, source: string = 'in-memory'): void {
    this.pending = null;
    this.state = { status: 'ready', model, source };
  }

  dispose(): void {
    this.pending = null;
    this.state = { status: 'uninitialized' };
  }

  getStatus(): {
    status: ModelState['status'];
    schemaVersion?: string;
    source?: string;
    reason?: ModelUnavailableReason;
    detail?: string;
  } {
    switch (this.state.status) {
      case 'ready':
        return {
          status: 'ready',
          schemaVersion: this.state.model.schemaVersion,
          source: this.state.source,
        };
      case 'unavailable':
        return { status: 'unavailable', reason: this.state.reason, detail: this.state.detail };
      default:
        return { status: this.state.status };
    }
  }

  private async load(): Promise<ModelState> {
    try {
      const model = await this.loader(this.modelPath);
      assertCompatible(model);
      registryLogger.info(
        { modelPath: this.modelPath, schemaVersion: model.schemaVersion },
        'Model artifact loaded',
      );
      return { status: 'ready', model, source: this.modelPath };
    } catch (error) {
      const err = toError(error);
      const reason = err instanceof FeatureSchemaMismatchError ? 'schema_mismatch' : 'load_failed';
      registryLogger.warn(
        { modelPath: this.modelPath, reason, error: err.message },
        'Model unavailable, falling back to heuristic evaluation',
      );
      return { status: 'unavailable', reason, detail: err.message };
    }
  }
}

/**
 * The artifact must expect exactly the features this build extracts
 */
function assertCompatible(model: ModelArtifact): void {
  const sameNames =
    model.featureNames.length === FEATURE_NAMES.length &&
    model.featureNames.every((name, i) => name === FEATURE_NAMES[i]);

  if (model.schemaVersion !== FEATURE_SCHEMA_VERSION || !sameNames) {
    throw new FeatureSchemaMismatchError(
      [...FEATURE_NAMES],
      [`schema ${model.schemaVersion}`, ...model.featureNames],
    );
  }
}

// Singleton instance for global access
let globalRegistry: ModelRegistry | null = null;

export function getModelRegistry(): ModelRegistry {
  if (!globalRegistry) {
    globalRegistry = new ModelRegistry();
  }
  return globalRegistry;
}

export async function initializeModel(): Promise<ModelState> {
  return getModelRegistry().initialize();
}

export function disposeModel(): void {
  if (globalRegistry) {
    globalRegistry.dispose();
    globalRegistry = null;
  }
}
