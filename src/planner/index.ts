/**
 * Planner stage: catalog file in, `concat_metadata.json` out.
 */
import { createLogger } from '../utils/logger.js';
import { planConcatenations, type PlanResult } from './builder.js';
import { VideoCatalog } from './catalog.js';
import { resolvePlannerOptions } from './options.js';
import { savePlan } from './records.js';
import type { PlannerOptions } from './types.js';

const log = createLogger('Planner');

export function runPlanner(
  catalogPath: string,
  outputPath: string,
  overrides: Partial<PlannerOptions> = {},
): PlanResult {
  const options = resolvePlannerOptions(overrides);
  log.info('starting video concatenation planning', { catalogPath, outputPath, ...options });

  const catalog = VideoCatalog.load(catalogPath);
  const result = planConcatenations(catalog, options);

  savePlan(outputPath, result.records);
  log.info('metadata saved', { outputPath, records: result.records.length });
  return result;
}

export { ConcatenationBuilder, planConcatenations } from './builder.js';
export type { AssemblyOutcome, PlanResult } from './builder.js';
export { VideoCatalog } from './catalog.js';
export { UsageLedger } from './ledger.js';
export { resolvePlannerOptions } from './options.js';
export { loadPlan, savePlan } from './records.js';
