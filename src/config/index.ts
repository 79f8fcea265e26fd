/**
 * Environment configuration
 */

import { fileURLToPath } from 'node:url';

const DEFAULT_MODEL_PATH = fileURLToPath(new URL('../../models/default-model.json', import.meta.url));

function readNumber(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isFinite(value) ? value : fallback;
}

const nodeEnv = process.env.NODE_ENV || 'development';
const isProduction = nodeEnv === 'production';
const isTest = nodeEnv === 'test';

export const config = {
  // Server
  nodeEnv,
  port: parseInt(process.env.PORT || '3001', 10),
  isProduction,
  isTest,
  logLevel: process.env.LOG_LEVEL || (isTest ? 'silent' : isProduction ? 'info' : 'debug'),

  // Model artifact
  modelPath: process.env.MODEL_PATH || DEFAULT_MODEL_PATH,

  // Blending policy
  blendMlWeight: readNumber('BLEND_ML_WEIGHT', 0.7),
  blendHeuristicWeight: readNumber('BLEND_HEURISTIC_WEIGHT', 0.3),

  // Advisory defaults
  blunderThreshold: readNumber('BLUNDER_THRESHOLD', -2.0),
  defaultSuggestionCount: readNumber('DEFAULT_SUGGESTION_COUNT', 3),
  maxSuggestionCount: readNumber('MAX_SUGGESTION_COUNT', 20),

  // CORS
  allowedOrigins: (process.env.ALLOWED_ORIGINS || 'http://localhost:8080')
    .split(',')
    .map((o) => o.trim()),
} as const;

/**
 * Returns human-readable warnings for suspicious settings.
 * Nothing here is fatal: the engine can always run on heuristics alone.
 */
export function validateConfig(): string[] {
  const warnings: string[] = [];

  const weightSum = config.blendMlWeight + config.blendHeuristicWeight;
  if (config.blendMlWeight < 0 || config.blendHeuristicWeight < 0) {
    warnings.push('Blend weights should not be negative');
  }
  if (Math.abs(weightSum - 1) > 1e-9) {
    warnings.push(`Blend weights sum to ${weightSum}, expected 1`);
  }
  if (config.blunderThreshold >= 0) {
    warnings.push(`BLUNDER_THRESHOLD is ${config.blunderThreshold}; a negative value is expected`);
  }
  if (config.defaultSuggestionCount < 1 || config.defaultSuggestionCount > config.maxSuggestionCount) {
    warnings.push('DEFAULT_SUGGESTION_COUNT must be between 1 and MAX_SUGGESTION_COUNT');
  }

  return warnings;
}
