import type { ConcatAnnotation } from './annotator.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Cleaner');

export interface CleanResult {
  kept: ConcatAnnotation[];
  removed: ConcatAnnotation[];
}

/** Drop every record that has at least one segment with a blank summary. */
export function dropEmptySummaries(annotations: readonly ConcatAnnotation[]): CleanResult {
  const kept: ConcatAnnotation[] = [];
  const removed: ConcatAnnotation[] = [];

  for (const annotation of annotations) {
    const blank = annotation.data.filter(seg => !seg.summary.trim());
    if (blank.length === 0) {
      kept.push(annotation);
      continue;
    }
    removed.push(annotation);
    log.info('removing record with empty summaries', {
      video: annotation.video,
      segments: blank.map(seg => `${seg.video_id} ${seg.start}-${seg.end}`),
    });
  }

  log.info(`removed ${removed.length} records with empty summaries`, { kept: kept.length });
  return { kept, removed };
}
