/**
 * Zod validation schemas for API requests
 */

import { z } from 'zod';
import { DEFAULT_TOP_N, MAX_TOP_N } from '../config/constants.js';

export const evaluateRequestSchema = z.object({
  fen: z.string().min(1, 'FEN is required').max(100, 'FEN is too long'),
  llm_move_san: z.string().min(1, 'Move is required').max(16, 'Move is too long'),
  top_n: z.number().int().min(1).max(MAX_TOP_N).default(DEFAULT_TOP_N),
  multipv: z.boolean().default(false),
});

export type EvaluateRequestInput = z.infer<typeof evaluateRequestSchema>;

export function validateRequest<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): { success: true; data: T } | { success: false; errors: z.ZodError } {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return { success: false, errors: result.error };
}

export function formatValidationErrors(
  errors: z.ZodError
): Array<{ path: string; message: string }> {
  return errors.errors.map((e) => ({
    path: e.path.join('.'),
    message: e.message,
  }));
}
