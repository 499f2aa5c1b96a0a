/**
 * Command-line parsing: `concat-planner <command> [--flags]`.
 * Flags override the environment defaults from config.ts.
 */
import { parseArgs } from 'util';
import type { PlannerOptions, ReuseMode } from './planner/types.js';
import { telegram } from './monitoring/telegram.js';
import { ConfigError, errorMessage } from './utils/errors.js';
import { logger } from './utils/logger.js';

export const COMMANDS = ['metadata', 'sample', 'plan', 'annotate', 'clean', 'conversations', 'stats', 'run'] as const;

export type Command = typeof COMMANDS[number];

const OPTIONS = {
  // paths
  'input':           { type: 'string' },
  'output':          { type: 'string' },
  'input-dir':       { type: 'string' },
  'frames-dir':      { type: 'string' },
  'plan':            { type: 'string' },
  'annotations':     { type: 'string' },
  'descriptions':    { type: 'string' },
  'workspace':       { type: 'string' },
  // planner
  'total-concats':   { type: 'string' },
  'min-videos':      { type: 'string' },
  'max-videos':      { type: 'string' },
  'duration-min':    { type: 'string' },
  'duration-max':    { type: 'string' },
  'no-reuse':        { type: 'boolean' },
  'reuse-mode':      { type: 'string' },
  'max-usage-ratio': { type: 'string' },
  'seed':            { type: 'string' },
  'shuffle-catalog': { type: 'boolean' },
  // stages
  'min-duration':    { type: 'string' },
  'interval':        { type: 'string' },
  'workers':         { type: 'string' },
  'transition-workers': { type: 'string' },
  'transitions':     { type: 'boolean' },
  'prompt':          { type: 'string' },
  'help':            { type: 'boolean', short: 'h' },
} as const;

function parse(argv: string[]) {
  return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
}

export type CliFlags = ReturnType<typeof parse>['values'];

export interface CommandLine {
  command: Command | null;
  /** Whatever was typed, for the unknown-command message. */
  rawCommand: string | undefined;
  flags: CliFlags;
}

export const USAGE = `Usage: concat-planner <command> [--flags]

Commands:
  metadata       --input-dir <dir> [--output <file>] [--min-duration <s>]
  sample         --input-dir <dir> [--frames-dir <dir>] [--output <file>] [--interval <s>] [--min-duration <s>] [--workers <n>]
  plan           [--input <catalog>] [--output <file>] [planner flags]
  annotate       --descriptions <file> [--plan <file>] [--output <file>] [--transitions] [--transition-workers <n>]
  clean          [--input <file>] [--output <file>]
  conversations  [--plan <file>] [--annotations <file>] [--output <file>] [--prompt <text>]
  stats          [--input <file>] [--plan <file>] [--output <file>]
  run            --input-dir <dir> --descriptions <file> [--workspace <dir>] [--workers <n>]
                 [--transitions] [--transition-workers <n>] [planner flags]

--workers sets the frame sampling pool; annotate also accepts it for transitions.

Planner flags:
  --total-concats <n>  --min-videos <n>  --max-videos <n>
  --duration-min <s>   --duration-max <s>
  --no-reuse  --reuse-mode balanced|random  --max-usage-ratio <r>
  --seed <n>  --shuffle-catalog
`;

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some(c => c === value);
}

export function parseCommandLine(argv: string[]): CommandLine {
  const { values, positionals } = parse(argv);
  const [rawCommand] = positionals;
  return { command: isCommand(rawCommand) ? rawCommand : null, rawCommand, flags: values };
}

// ── Flag conversion ───────────────────────────────────────────────────────────

export function numberFlag(raw: string | undefined, flag: string): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new ConfigError(`--${flag} expects a number, got "${raw}"`);
  }
  return value;
}

export function requiredFlag(raw: string | undefined, flag: string): string {
  if (!raw) throw new ConfigError(`--${flag} is required`);
  return raw;
}

function reuseModeFlag(raw: string | undefined): ReuseMode | undefined {
  if (raw === undefined) return undefined;
  if (raw === 'balanced' || raw === 'random') return raw;
  throw new ConfigError(`--reuse-mode must be "balanced" or "random", got "${raw}"`);
}

/** Planner overrides from flags; absent flags stay undefined and fall back to env defaults. */
export function plannerOverrides(flags: CliFlags): Partial<PlannerOptions> {
  return {
    totalConcats:       numberFlag(flags['total-concats'], 'total-concats'),
    minVideosPerConcat: numberFlag(flags['min-videos'], 'min-videos'),
    maxVideosPerConcat: numberFlag(flags['max-videos'], 'max-videos'),
    targetDurationMin:  numberFlag(flags['duration-min'], 'duration-min'),
    targetDurationMax:  numberFlag(flags['duration-max'], 'duration-max'),
    allowReuse:         flags['no-reuse'] ? false : undefined,
    reuseMode:          reuseModeFlag(flags['reuse-mode']),
    maxUsageRatio:      numberFlag(flags['max-usage-ratio'], 'max-usage-ratio'),
    seed:               numberFlag(flags['seed'], 'seed'),
    shuffleCatalog:     flags['shuffle-catalog'] ? true : undefined,
  };
}

// ── Fatal errors ──────────────────────────────────────────────────────────────

/** Log a fatal error and alert Telegram; `run` has already alerted from the pipeline. */
export async function reportFatal(command: Command | null, err: unknown): Promise<void> {
  logger.error(`Fatal: ${errorMessage(err)}`, { error: err });
  if (command === 'run') return;
  await telegram.error(`${command ?? 'concat-planner'} failed: ${errorMessage(err)}`);
}
