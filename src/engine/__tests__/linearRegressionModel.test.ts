import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, it, expect } from 'vitest';

import { LinearRegressionModel, loadLinearModel, modelFileSchema } from '../LinearRegressionModel.js';
import { config } from '../../config/index.js';
import { FEATURE_NAMES, FEATURE_SCHEMA_VERSION } from '../../config/constants.js';
import type { FeatureVector } from '../../types/index.js';
import { FeatureSchemaMismatchError, ModelUnavailableError } from '../../utils/errors.js';

const COEFFICIENTS = [1, 0.5, 0, 0, 0, 0, 0, 0, 0, -2];

function vector(values: number[]): FeatureVector {
  return { schemaVersion: FEATURE_SCHEMA_VERSION, names: FEATURE_NAMES, values };
}

describe('LinearRegressionModel', () => {
  const model = new LinearRegressionModel({
    schemaVersion: 'v1',
    featureNames: [...FEATURE_NAMES],
    coefficients: COEFFICIENTS,
    intercept: 0.25,
  });

  it('should compute intercept plus weighted sum', () => {
    // 0.25 + 1*2 + 0.5*10 - 2*1
    expect(model.predict(vector([2, 10, 0, 0, 0, 0, 0, 0, 0, 1]))).toBe(5.25);
  });

  it('should reject vectors in a different order', () => {
    const reversed: FeatureVector = {
      schemaVersion: FEATURE_SCHEMA_VERSION,
      names: [...FEATURE_NAMES].reverse(),
      values: new Array<number>(FEATURE_NAMES.length).fill(0),
    };
    expect(() => model.predict(reversed)).toThrow(FeatureSchemaMismatchError);
  });

  it('should reject vectors with missing values', () => {
    expect(() => model.predict(vector([1, 2, 3]))).toThrow(FeatureSchemaMismatchError);
  });
});

describe('modelFileSchema', () => {
  it('should require one coefficient per feature', () => {
    const result = modelFileSchema.safeParse({
      schemaVersion: 'v1',
      featureNames: ['a', 'b'],
      coefficients: [1],
      intercept: 0,
    });
    expect(result.success).toBe(false);
  });
});

describe('loadLinearModel', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'advisor-model-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should load a valid file', async () => {
    const path = join(dir, 'valid.json');
    await writeFile(
      path,
      JSON.stringify({
        schemaVersion: 'v1',
        featureNames: [...FEATURE_NAMES],
        coefficients: COEFFICIENTS,
        intercept: 0,
      }),
    );

    const model = await loadLinearModel(path);
    expect(model.schemaVersion).toBe('v1');
    expect(model.featureNames).toEqual([...FEATURE_NAMES]);
  });

  it('should load the bundled default model', async () => {
    const model = await loadLinearModel(config.modelPath);
    expect(model.schemaVersion).toBe(FEATURE_SCHEMA_VERSION);
    expect(model.featureNames).toEqual([...FEATURE_NAMES]);
  });

  it('should fail on a missing file', async () => {
    await expect(loadLinearModel(join(dir, 'missing.json'))).rejects.toThrow(ModelUnavailableError);
    await expect(loadLinearModel(join(dir, 'missing.json'))).rejects.toThrow(/could not be read/);
  });

  it('should fail on invalid JSON', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ "schemaVersion": ');
    await expect(loadLinearModel(path)).rejects.toThrow(/not valid JSON/);
  });

  it('should fail on a malformed artifact', async () => {
    const path = join(dir, 'malformed.json');
    await writeFile(path, JSON.stringify({ schemaVersion: 'v1', featureNames: ['a'], intercept: 0 }));
    await expect(loadLinearModel(path)).rejects.toThrow(/malformed/);
  });
});
