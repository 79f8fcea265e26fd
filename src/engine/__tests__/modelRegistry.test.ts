import { describe, it, expect, vi } from 'vitest';

import { ModelRegistry } from '../ModelRegistry.js';
import type { ModelArtifact } from '../../types/index.js';
import { constantModel } from '../../__tests__/fixtures.js';

describe('ModelRegistry', () => {
  it('should share one load between concurrent callers', async () => {
    const loader = vi.fn(async (_path: string): Promise<ModelArtifact> => constantModel(1));
    const registry = new ModelRegistry('model.json', loader);

    const first = registry.initialize();
    const second = registry.initialize();
    expect(second).toBe(first);
    expect(registry.getState().status).toBe('loading');

    const state = await first;
    expect(state.status).toBe('ready');
    expect(loader).toHaveBeenCalledTimes(1);

    await registry.initialize();
    expect(loader).toHaveBeenCalledTimes(1);
    expect(registry.initialized).toBe(true);
  });

  it('should report ready status with its source', async () => {
    const registry = new ModelRegistry('model.json', async () => constantModel(1));
    await registry.initialize();

    expect(registry.getStatus()).toEqual({ status: 'ready', schemaVersion: 'v1', source: 'model.json' });
    expect(registry.getState()).toMatchObject({ status: 'ready', source: 'model.json' });
  });

  it('should become unavailable when the file is missing', async () => {
    const registry = new ModelRegistry('/nonexistent/model.json');
    const state = await registry.initialize();

    expect(state.status).toBe('unavailable');
    expect(registry.getStatus()).toMatchObject({ status: 'unavailable', reason: 'load_failed' });
    expect(registry.getState()).toMatchObject({ status: 'unavailable', reason: 'load_failed' });
  });

  it('should refuse a model trained on another feature schema', async () => {
    const registry = new ModelRegistry('model.json', async () => ({
      schemaVersion: 'v1',
      featureNames: ['material_balance'],
      predict: () => 0,
    }));

    await registry.initialize();
    expect(registry.getStatus()).toMatchObject({ status: 'unavailable', reason: 'schema_mismatch' });
  });

  it('should refuse a model with another schema version', async () => {
    const registry = new ModelRegistry('model.json', async () => ({
      ...constantModel(0),
      schemaVersion: 'v2',
    }));

    await registry.initialize();
    expect(registry.getStatus()).toMatchObject({ status: 'unavailable', reason: 'schema_mismatch' });
  });

  it('should register in-memory models', () => {
    const registry = new ModelRegistry('model.json');
    registry.use(constantModel(2));

    expect(registry.getStatus()).toEqual({ status: 'ready', schemaVersion: 'v1', source: 'in-memory' });
  });

  it('should ignore a load that finishes after dispose', async () => {
    const registry = new ModelRegistry('model.json', async () => constantModel(1));
    const pending = registry.initialize();
    registry.dispose();

    await pending;
    expect(registry.getState().status).toBe('uninitialized');
  });
});
