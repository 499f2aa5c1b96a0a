/**
 * Pipeline orchestrator — runs every stage end-to-end under one workspace.
 * Called by `concat-planner run`.
 *
 * Order: sample → plan → annotate → clean → conversations → stats.
 */
import * as fs from 'fs';
import * as path from 'path';
import { ARTIFACTS, env } from '../config.js';
import { isLlmConfigured } from '../ai/claude.js';
import { telegram } from '../monitoring/telegram.js';
import { runPlanner } from '../planner/index.js';
import type { PlannerOptions } from '../planner/types.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import {
  buildConcatAnnotations,
  createTransitionWriter,
  loadVideoDescriptions,
  saveAnnotations,
  type TransitionWriter,
} from './annotator.js';
import { dropEmptySummaries } from './cleaner.js';
import { buildTrainConversations, saveConversations } from './conversations.js';
import { sampleVideos, type SamplerDeps } from './sampler.js';
import { analyzeAnnotations, formatStatsReport, summarizeUsage } from './stats.js';

const log = createLogger('Pipeline');

// ── Types ─────────────────────────────────────────────────────────────────────

export interface WorkspacePaths {
  root: string;
  framesDir: string;
  videoMetadata: string;
  plan: string;
  annotations: string;
  cleaned: string;
  conversations: string;
  statsReport: string;
}

export interface PipelineInputs {
  videosDir: string;
  descriptionsFile: string;
  workspaceDir?: string;
}

export interface PipelineOptions {
  planner?: Partial<PlannerOptions>;
  samplingInterval?: number;
  minVideoDuration?: number;
  sampleWorkers?: number;
  transitionWorkers?: number;
  prompt?: string;
  /** Rewrite follow-on segment summaries with the LLM when a key is configured. */
  transitions?: boolean;
}

export interface PipelineDeps {
  sampler?: SamplerDeps;
  writeTransition?: TransitionWriter;
}

export interface PipelineSummary {
  paths: WorkspacePaths;
  sampled: number;
  failedVideos: number;
  requested: number;
  planned: number;
  discarded: number;
  annotated: number;
  removedEmpty: number;
  conversations: number;
}

export function workspacePaths(workspaceDir: string): WorkspacePaths {
  const root = path.resolve(workspaceDir);
  return {
    root,
    framesDir:     path.join(root, 'sample_frames'),
    videoMetadata: path.join(root, ARTIFACTS.videoMetadata),
    plan:          path.join(root, ARTIFACTS.plan),
    annotations:   path.join(root, ARTIFACTS.annotations),
    cleaned:       path.join(root, ARTIFACTS.cleaned),
    conversations: path.join(root, ARTIFACTS.conversations),
    statsReport:   path.join(root, ARTIFACTS.statsReport),
  };
}

function pickTransitionWriter(opts: PipelineOptions, deps: PipelineDeps): TransitionWriter | undefined {
  if (deps.writeTransition) return deps.writeTransition;
  if (!opts.transitions) return undefined;
  if (!isLlmConfigured()) {
    log.warn('transitions requested but ANTHROPIC_API_KEY is not set, keeping source summaries');
    return undefined;
  }
  return createTransitionWriter();
}

// ── Orchestrator ──────────────────────────────────────────────────────────────

export async function runPipeline(
  inputs: PipelineInputs,
  opts: PipelineOptions = {},
  deps: PipelineDeps = {},
): Promise<PipelineSummary> {
  const paths = workspacePaths(inputs.workspaceDir ?? env.WORKSPACE_DIR);
  log.info('starting run', { workspace: paths.root, videosDir: inputs.videosDir });

  try {
    // Step 1: frames + catalog
    const sampling = await sampleVideos(
      {
        inputDir:        inputs.videosDir,
        framesDir:       paths.framesDir,
        metadataPath:    paths.videoMetadata,
        intervalSeconds: opts.samplingInterval ?? env.SAMPLING_INTERVAL,
        minDuration:     opts.minVideoDuration ?? env.MIN_VIDEO_DURATION,
        workers:         opts.sampleWorkers ?? env.SAMPLE_WORKERS,
      },
      deps.sampler,
    );
    if (sampling.failed.length > 0) {
      await telegram.alert(`Frame sampling failed for ${sampling.failed.length} video(s); see ${sampling.failedPath}`);
    }

    // Step 2: plan
    const plan = runPlanner(paths.videoMetadata, paths.plan, opts.planner);

    // Step 3: annotate
    const descriptions = loadVideoDescriptions(inputs.descriptionsFile);
    const annotations = await buildConcatAnnotations(plan.records, descriptions, {
      writeTransition: pickTransitionWriter(opts, deps),
      workers:         opts.transitionWorkers ?? env.TRANSITION_WORKERS,
    });
    saveAnnotations(paths.annotations, annotations);

    // Step 4: clean
    const { kept, removed } = dropEmptySummaries(annotations);
    saveAnnotations(paths.cleaned, kept);

    // Step 5: conversations for the records that survived cleaning
    const keptIds = new Set(kept.map(a => a.video));
    const conversations = buildTrainConversations(
      plan.records.filter(r => keptIds.has(r.recordId)),
      kept,
      opts.prompt ?? env.CONVERSATION_PROMPT,
    );
    saveConversations(paths.conversations, conversations);

    // Step 6: stats
    const report = formatStatsReport(analyzeAnnotations(kept), summarizeUsage(plan.usage));
    fs.writeFileSync(paths.statsReport, report, 'utf-8');

    const summary: PipelineSummary = {
      paths,
      sampled:       sampling.sampled.length,
      failedVideos:  sampling.failed.length,
      requested:     plan.requested,
      planned:       plan.records.length,
      discarded:     plan.discarded.length,
      annotated:     annotations.length,
      removedEmpty:  removed.length,
      conversations: conversations.length,
    };

    await telegram.planSummary({
      requested:   plan.requested,
      produced:    conversations.length,
      discarded:   plan.discarded.length + removed.length,
      catalogSize: plan.catalogSize,
    });

    log.info('complete', {
      workspace:     paths.root,
      planned:       summary.planned,
      conversations: summary.conversations,
      failedVideos:  summary.failedVideos,
    });
    return summary;
  } catch (err) {
    log.error('fatal error', { error: err });
    await telegram.error(`Pipeline failed: ${errorMessage(err)}`);
    throw err;
  }
}
