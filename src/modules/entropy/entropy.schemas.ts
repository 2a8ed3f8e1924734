/**
 * ENTROPY MODULE — Request schemas
 */

import { z } from 'zod';
import { ENTROPY_CONFIG } from './entropy.config.js';

export function countQuery(max: number, defaultCount: number) {
  return z.object({
    count: z.coerce.number().int().min(1).max(max).default(defaultCount),
  });
}

export const MixedQuery = z.object({
  count: z.coerce.number().int().min(1).max(ENTROPY_CONFIG.mixedReadLimit).default(100),
  sources: z
    .string()
    .optional()
    .transform(csv =>
      csv === undefined
        ? undefined
        : csv.split(',').map(s => s.trim()).filter(s => s.length > 0)
    ),
});

export type MixedQueryInput = z.infer<typeof MixedQuery>;
