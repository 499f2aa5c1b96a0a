#!/usr/bin/env tsx
/**
 * Pre-flight check for the concatenation pipeline.
 * Checks ffmpeg/ffprobe, the environment schema, optional credentials and the workspace directory.
 * Run: npm run check-env
 *
 * Exit codes:
 *   0 — all required checks pass
 *   1 — one or more required checks failed
 */
import { execFileSync } from 'child_process';
import { accessSync, constants, existsSync, mkdirSync } from 'fs';
import { resolve } from 'path';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── ANSI color helpers ────────────────────────────────────────────────────────

const GREEN  = '\x1b[32m';
const RED    = '\x1b[31m';
const YELLOW = '\x1b[33m';
const BOLD   = '\x1b[1m';
const RESET  = '\x1b[0m';

const pass = (label: string, detail = '') =>
  console.log(`  ${GREEN}✓${RESET} ${label}${detail ? `  ${YELLOW}${detail}${RESET}` : ''}`);

const fail = (label: string, hint = '') => {
  console.error(`  ${RED}✗${RESET} ${label}${hint ? `\n    ${YELLOW}hint: ${hint}${RESET}` : ''}`);
};

const skip = (label: string, note: string) =>
  console.log(`  ${YELLOW}○${RESET} ${label}  (${note})`);

let anyRequiredFailed = false;

// ── Section: Media tools ──────────────────────────────────────────────────────

console.log(`\n${BOLD}=== Concat planner — Pre-flight Check ===${RESET}\n`);
console.log(`${BOLD}[ 1 ] Media tools${RESET}`);

for (const tool of ['ffmpeg', 'ffprobe']) {
  try {
    const banner = execFileSync(tool, ['-version'], { encoding: 'utf-8' }).split('\n')[0] ?? '';
    pass(tool, banner.trim());
  } catch {
    fail(tool, `Install ${tool} and make sure it is on PATH`);
    anyRequiredFailed = true;
  }
}

// ── Section: Environment schema ───────────────────────────────────────────────

console.log(`\n${BOLD}[ 2 ] Environment variables${RESET}`);

// config.ts validates on import and throws with the list of invalid keys
const config = await import('../src/config.js').catch((err: unknown) => {
  fail('environment schema', err instanceof Error ? err.message : String(err));
  anyRequiredFailed = true;
  return null;
});

if (config) {
  const { env } = config;
  pass('environment schema');
  console.log(`  ${YELLOW}○${RESET} planner defaults  ${env.TOTAL_CONCATS} concats, ` +
    `${env.MIN_VIDEOS_PER_CONCAT}-${env.MAX_VIDEOS_PER_CONCAT} videos, ` +
    `${env.TARGET_DURATION_MIN}-${env.TARGET_DURATION_MAX}s, reuse ${env.ALLOW_REUSE ? env.REUSE_MODE : 'off'}`);

  // ── Section: Optional credentials ─────────────────────────────────────────

  console.log(`\n${BOLD}[ 3 ] Optional credentials${RESET}`);

  const optional: Array<[string, string | undefined, string]> = [
    ['ANTHROPIC_API_KEY',  env.ANTHROPIC_API_KEY,  'needed for annotate --transitions'],
    ['OPENAI_API_KEY',     env.OPENAI_API_KEY,     'fallback when Anthropic returns 5xx'],
    ['TELEGRAM_BOT_TOKEN', env.TELEGRAM_BOT_TOKEN, 'run notifications disabled'],
    ['TELEGRAM_CHAT_ID',   env.TELEGRAM_CHAT_ID,   'run notifications disabled'],
  ];
  for (const [label, value, note] of optional) {
    if (value) pass(label, value.length > 10 ? `${value.slice(0, 6)}…` : '(set)');
    else skip(label, `not set: ${note}`);
  }

  // ── Section: Workspace ────────────────────────────────────────────────────

  console.log(`\n${BOLD}[ 4 ] Workspace${RESET}`);

  const workspace = resolve(env.WORKSPACE_DIR);
  try {
    if (!existsSync(workspace)) mkdirSync(workspace, { recursive: true });
    accessSync(workspace, constants.W_OK);
    pass('WORKSPACE_DIR writable', workspace);
  } catch (err) {
    fail('WORKSPACE_DIR writable', err instanceof Error ? err.message : String(err));
    anyRequiredFailed = true;
  }
}

// ── Summary ───────────────────────────────────────────────────────────────────

console.log('');
if (anyRequiredFailed) {
  console.error(`${RED}${BOLD}FAILED — one or more required checks did not pass.${RESET}`);
  console.error(`${YELLOW}Fix the issues above, then re-run: npm run check-env${RESET}\n`);
  process.exit(1);
} else {
  console.log(`${GREEN}${BOLD}PASSED — all required checks complete.${RESET}`);
  console.log(`${YELLOW}Next: npm run pipeline -- --input-dir <videos> --descriptions <file>${RESET}\n`);
}
