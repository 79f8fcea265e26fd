/**
 * Zod validation schemas for API requests
 */

import { z } from 'zod';
import { config } from '../config/index.js';

const fenField = z.string().trim().min(1, 'FEN is required').max(100, 'FEN is too long');

const thresholdField = z.number().finite().max(0, 'Threshold must not be positive');

export const positionRequestSchema = z.object({
  fen: fenField,
});

export const suggestionsRequestSchema = z.object({
  fen: fenField,
  k: z.number().int().min(1).max(config.maxSuggestionCount).optional(),
});

export const blunderRequestSchema = z.object({
  fen: fenField,
  move: z.string().trim().min(2, 'Move is required').max(10, 'Move is too long'),
  fenAfter: fenField.optional(),
  threshold: thresholdField.optional(),
});

export const blunderScanRequestSchema = z.object({
  fen: fenField,
  threshold: thresholdField.optional(),
});

export function validateRequest<T>(
  schema: z.ZodSchema<T>,
  data: unknown
): { success: true; data: T } | { success: false; errors: z.ZodError } {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: result.error };
}
