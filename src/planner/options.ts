import { z } from 'zod';
import { PLANNER_DEFAULTS } from '../config.js';
import { ConfigError } from '../utils/errors.js';
import type { PlannerOptions } from './types.js';

const PlannerOptionsSchema = z.object({
  totalConcats:       z.number().int().positive(),
  minVideosPerConcat: z.number().int().positive(),
  maxVideosPerConcat: z.number().int().positive(),
  targetDurationMin:  z.number().finite().nonnegative(),
  targetDurationMax:  z.number().finite().positive(),
  allowReuse:         z.boolean(),
  reuseMode:          z.enum(['balanced', 'random']),
  maxUsageRatio:      z.number().finite(),
  seed:               z.number().int(),
  shuffleCatalog:     z.boolean(),
})
  .refine(o => o.minVideosPerConcat <= o.maxVideosPerConcat, {
    message: 'minVideosPerConcat must not exceed maxVideosPerConcat',
    path: ['minVideosPerConcat'],
  })
  .refine(o => o.targetDurationMin <= o.targetDurationMax, {
    message: 'targetDurationMin must not exceed targetDurationMax',
    path: ['targetDurationMin'],
  });

/**
 * Merge overrides onto the environment defaults and validate the result.
 * Undefined override values fall through to the default.
 */
export function resolvePlannerOptions(overrides: Partial<PlannerOptions> = {}): PlannerOptions {
  const merged: Record<string, unknown> = { ...PLANNER_DEFAULTS };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[key] = value;
  }

  const parsed = PlannerOptionsSchema.safeParse(merged);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(i => `${i.path.join('.') || 'options'}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`Invalid planner options: ${details}`, parsed.error);
  }
  return parsed.data;
}
