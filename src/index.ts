#!/usr/bin/env node
/**
 * CLI entry point — routes commands to stage handlers.
 */
import * as fs from 'fs';
import * as path from 'path';
import { env } from './config.js';
import {
  USAGE,
  numberFlag,
  parseCommandLine,
  plannerOverrides,
  reportFatal,
  requiredFlag,
  type CliFlags,
  type Command,
} from './cli.js';
import { isLlmConfigured } from './ai/claude.js';
import { telegram } from './monitoring/telegram.js';
import { generateVideoMetadata } from './pipeline/metadata.js';
import { sampleVideos } from './pipeline/sampler.js';
import {
  buildConcatAnnotations,
  createTransitionWriter,
  loadAnnotations,
  loadVideoDescriptions,
  saveAnnotations,
} from './pipeline/annotator.js';
import { dropEmptySummaries } from './pipeline/cleaner.js';
import { buildTrainConversations, saveConversations } from './pipeline/conversations.js';
import { runPipeline, workspacePaths, type WorkspacePaths } from './pipeline/index.js';
import { analyzeAnnotations, formatStatsReport, summarizeUsage, usageFromPlan } from './pipeline/stats.js';
import { loadPlan, runPlanner } from './planner/index.js';
import { logger } from './utils/logger.js';

async function annotate(flags: CliFlags, ws: WorkspacePaths): Promise<void> {
  if (flags.transitions && !isLlmConfigured()) {
    logger.warn('--transitions given but ANTHROPIC_API_KEY is not set, keeping source summaries');
  }
  const plan = loadPlan(flags.plan ?? ws.plan);
  const descriptions = loadVideoDescriptions(requiredFlag(flags.descriptions, 'descriptions'));
  const annotations = await buildConcatAnnotations(plan, descriptions, {
    writeTransition: flags.transitions && isLlmConfigured() ? createTransitionWriter() : undefined,
    workers:         numberFlag(flags['transition-workers'], 'transition-workers')
      ?? numberFlag(flags.workers, 'workers')
      ?? env.TRANSITION_WORKERS,
  });
  saveAnnotations(flags.output ?? ws.annotations, annotations);
}

function stats(flags: CliFlags, ws: WorkspacePaths): void {
  const annotations = loadAnnotations(flags.input ?? ws.cleaned);
  const usage = flags.plan ? summarizeUsage(usageFromPlan(loadPlan(flags.plan))) : undefined;
  const report = formatStatsReport(analyzeAnnotations(annotations), usage);
  const output = flags.output ?? ws.statsReport;
  fs.mkdirSync(path.dirname(output), { recursive: true });
  fs.writeFileSync(output, report, 'utf-8');
  process.stdout.write(report);
}

let activeCommand: Command | null = null;

async function main(): Promise<void> {
  const { command, rawCommand, flags } = parseCommandLine(process.argv.slice(2));
  activeCommand = command;
  if (flags.help) {
    process.stdout.write(USAGE);
    return;
  }
  const ws = workspacePaths(flags.workspace ?? env.WORKSPACE_DIR);

  switch (command) {
    case 'metadata':
      await generateVideoMetadata(
        requiredFlag(flags['input-dir'], 'input-dir'),
        flags.output ?? ws.videoMetadata,
        numberFlag(flags['min-duration'], 'min-duration'),
      );
      break;
    case 'sample':
      await sampleVideos({
        inputDir:        requiredFlag(flags['input-dir'], 'input-dir'),
        framesDir:       flags['frames-dir'] ?? ws.framesDir,
        metadataPath:    flags.output ?? ws.videoMetadata,
        intervalSeconds: numberFlag(flags.interval, 'interval') ?? env.SAMPLING_INTERVAL,
        minDuration:     numberFlag(flags['min-duration'], 'min-duration') ?? env.MIN_VIDEO_DURATION,
        workers:         numberFlag(flags.workers, 'workers') ?? env.SAMPLE_WORKERS,
      });
      break;
    case 'plan': {
      const result = runPlanner(flags.input ?? ws.videoMetadata, flags.output ?? ws.plan, plannerOverrides(flags));
      await telegram.planSummary({
        requested:   result.requested,
        produced:    result.records.length,
        discarded:   result.discarded.length,
        catalogSize: result.catalogSize,
      });
      break;
    }
    case 'annotate':
      await annotate(flags, ws);
      break;
    case 'clean': {
      const { kept } = dropEmptySummaries(loadAnnotations(flags.input ?? ws.annotations));
      saveAnnotations(flags.output ?? ws.cleaned, kept);
      break;
    }
    case 'conversations': {
      const conversations = buildTrainConversations(
        loadPlan(flags.plan ?? ws.plan),
        loadAnnotations(flags.annotations ?? ws.cleaned),
        flags.prompt ?? env.CONVERSATION_PROMPT,
      );
      saveConversations(flags.output ?? ws.conversations, conversations);
      break;
    }
    case 'stats':
      stats(flags, ws);
      break;
    case 'run':
      await runPipeline(
        {
          videosDir:        requiredFlag(flags['input-dir'], 'input-dir'),
          descriptionsFile: requiredFlag(flags.descriptions, 'descriptions'),
          workspaceDir:     ws.root,
        },
        {
          planner:          plannerOverrides(flags),
          samplingInterval: numberFlag(flags.interval, 'interval'),
          minVideoDuration: numberFlag(flags['min-duration'], 'min-duration'),
          sampleWorkers:    numberFlag(flags.workers, 'workers'),
          transitionWorkers: numberFlag(flags['transition-workers'], 'transition-workers'),
          prompt:           flags.prompt,
          transitions:      flags.transitions,
        },
      );
      break;
    default:
      logger.error(`Unknown command: ${rawCommand ?? '(none)'}`);
      process.stderr.write(USAGE);
      process.exit(1);
  }
}

main().catch(async (err: unknown) => {
  await reportFatal(activeCommand, err);
  process.exit(1);
});
