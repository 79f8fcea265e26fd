/**
 * Linear regression model artifact.
 * The training pipeline exports coefficients as JSON; this class only predicts.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { FeatureVector, ModelArtifact } from '../types/index.js';
import { FeatureSchemaMismatchError, ModelUnavailableError, toError } from '../utils/errors.js';

export const modelFileSchema = z
  .object({
    schemaVersion: z.string().min(1),
    featureNames: z.array(z.string().min(1)).min(1),
    coefficients: z.array(z.number().finite()),
    intercept: z.number().finite(),
    description: z.string().optional(),
  })
  .refine((m) => m.coefficients.length === m.featureNames.length, {
    message: 'coefficients and featureNames must have the same length',
    path: ['coefficients'],
  });

export type ModelFile = z.infer<typeof modelFileSchema>;

export class LinearRegressionModel implements ModelArtifact {
  readonly schemaVersion: string;
  readonly featureNames: readonly string[];
  private readonly coefficients: readonly number[];
  private readonly intercept: number;

  constructor(file: ModelFile) {
    this.schemaVersion = file.schemaVersion;
    this.featureNames = Object.freeze([...file.featureNames]);
    this.coefficients = Object.freeze([...file.coefficients]);
    this.intercept = file.intercept;
  }

  /**
   * Throws FeatureSchemaMismatchError unless the vector carries exactly
   * the expected features in the expected order.
   */
  predict(features: FeatureVector): number {
    const matches =
      features.names.length === this.featureNames.length &&
      features.values.length === this.featureNames.length &&
      features.names.every((name, i) => name === this.featureNames[i]);

    if (!matches) {
      throw new FeatureSchemaMismatchError(this.featureNames, features.names);
    }

    let score = this.intercept;
    for (let i = 0; i < this.coefficients.length; i++) {
      score += this.coefficients[i] * features.values[i];
    }
    return score;
  }
}

/**
 * Read and validate a model file from disk
 */
export async function loadLinearModel(modelPath: string): Promise<LinearRegressionModel> {
  let raw: string;
  try {
    raw = await readFile(modelPath, 'utf8');
  } catch (error) {
    throw new ModelUnavailableError('Model file could not be read', modelPath, toError(error));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ModelUnavailableError('Model file is not valid JSON', modelPath, toError(error));
  }

  const result = modelFileSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ');
    throw new ModelUnavailableError(`Model file is malformed (${issues})`, modelPath);
  }

  return new LinearRegressionModel(result.data);
}
