import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const flag = z.enum(['true', 'false']).transform(v => v === 'true');

const EnvSchema = z.object({
  // LLM transition writing (optional: without a key the annotate stage keeps raw summaries)
  ANTHROPIC_API_KEY:        z.string().min(1).optional(),
  ANTHROPIC_MODEL:          z.string().min(1).default('claude-3-5-sonnet-latest'),
  OPENAI_API_KEY:           z.string().min(1).optional(),
  OPENAI_MODEL:             z.string().min(1).default('gpt-4o'),

  // Notifications
  TELEGRAM_BOT_TOKEN:       z.string().min(1).optional(),
  TELEGRAM_CHAT_ID:         z.string().min(1).optional(),

  // Planner defaults
  TOTAL_CONCATS:            z.coerce.number().int().positive().default(500),
  MIN_VIDEOS_PER_CONCAT:    z.coerce.number().int().positive().default(2),
  MAX_VIDEOS_PER_CONCAT:    z.coerce.number().int().positive().default(4),
  TARGET_DURATION_MIN:      z.coerce.number().nonnegative().default(20),
  TARGET_DURATION_MAX:      z.coerce.number().positive().default(60),
  ALLOW_REUSE:              flag.default('true'),
  REUSE_MODE:               z.enum(['balanced', 'random']).default('balanced'),
  MAX_USAGE_RATIO:          z.coerce.number().default(2.0),
  SEED:                     z.coerce.number().int().default(42),

  // Frame sampling
  SAMPLING_INTERVAL:        z.coerce.number().positive().default(1.0),
  MIN_VIDEO_DURATION:       z.coerce.number().nonnegative().default(0),
  SAMPLE_WORKERS:           z.coerce.number().int().positive().default(4),

  // Annotation
  TRANSITION_WORKERS:       z.coerce.number().int().positive().default(4),
  CONVERSATION_PROMPT:      z.string().min(1).default('Please describe what happens in the video.'),

  // Local storage
  WORKSPACE_DIR:            z.string().default('./workspace'),

  // Logging
  LOG_LEVEL:                z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:               z.enum(['text', 'json']).default('text'),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const invalid = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Missing or invalid environment variables: ${invalid}`);
}

export const env = parsed.data;

// ── Domain Types ─────────────────────────────────────────────────────────────

export type ReuseMode = 'balanced' | 'random';

// ── Planner ───────────────────────────────────────────────────────────────────

export const PLANNER_LIMITS = {
  maxAttemptsPerRecord: 100,
  relaxThresholdRatio:  0.5,   // relaxed filter only while below half the minimum duration
  progressEvery:        100,
} as const;

export const PLANNER_DEFAULTS = {
  totalConcats:        env.TOTAL_CONCATS,
  minVideosPerConcat:  env.MIN_VIDEOS_PER_CONCAT,
  maxVideosPerConcat:  env.MAX_VIDEOS_PER_CONCAT,
  targetDurationMin:   env.TARGET_DURATION_MIN,
  targetDurationMax:   env.TARGET_DURATION_MAX,
  allowReuse:          env.ALLOW_REUSE,
  reuseMode:           env.REUSE_MODE,
  maxUsageRatio:       env.MAX_USAGE_RATIO,
  seed:                env.SEED,
  shuffleCatalog:      false,
} as const;

// ── Media ─────────────────────────────────────────────────────────────────────

export const VIDEO_EXTENSIONS = ['.mp4', '.avi', '.mov', '.mkv'] as const;

export const SAMPLER_EXTENSIONS = ['.mp4'] as const;

// ── Retry Policy ──────────────────────────────────────────────────────────────

export const RETRY_POLICY = {
  maxRetries:  3,
  retryWaitMs: 2_000,
} as const;

// ── Output file names ─────────────────────────────────────────────────────────

export const ARTIFACTS = {
  videoMetadata:   'video_metadata.json',
  failedVideos:    'failed_videos.json',
  plan:            'concat_metadata.json',
  annotations:     'concatenated_video_annotations.json',
  cleaned:         'concatenated_video_annotations_cleaned.json',
  conversations:   'train_conversations.json',
  statsReport:     'concatenated_video_analysis.txt',
} as const;
