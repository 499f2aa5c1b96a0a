/**
 * FFmpeg / FFprobe wrappers — duration probing and fixed-interval frame sampling.
 *
 * Commands run through execFile (no shell), so paths need no quoting. The
 * async form lets the sampler keep several videos in flight.
 */
import { execFile } from 'child_process';
import { promisify } from 'util';
import * as fs from 'fs';
import * as path from 'path';
import { createLogger } from '../utils/logger.js';

const execFileAsync = promisify(execFile);
const log = createLogger('FFmpeg');

// ── Helpers ────────────────────────────────────────────────────────────────────

async function runFfmpeg(args: string[], label: string): Promise<void> {
  log.debug(`[${label}]`, { args });
  try {
    await execFileAsync('ffmpeg', ['-y', '-hide_banner', '-loglevel', 'error', ...args], {
      maxBuffer: 16 * 1024 * 1024,
    });
  } catch (err) {
    const stderr = typeof err === 'object' && err !== null && 'stderr' in err
      ? String(err.stderr).trim()
      : '';
    throw new Error(`FFmpeg ${label} failed: ${stderr || String(err)}`);
  }
}

async function runFfprobe(args: string[], label: string): Promise<string> {
  log.debug(`probe [${label}]`, { args });
  const { stdout } = await execFileAsync('ffprobe', ['-v', 'error', ...args], { encoding: 'utf-8' });
  return stdout.trim();
}

// ── Public API ─────────────────────────────────────────────────────────────────

/**
 * Container duration in seconds. Returns 0 when the file cannot be probed;
 * callers treat 0 as "unusable".
 */
export async function probeDuration(videoPath: string): Promise<number> {
  try {
    const raw = await runFfprobe(
      ['-show_entries', 'format=duration', '-of', 'csv=p=0', videoPath],
      'probeDuration',
    );
    const duration = parseFloat(raw);
    return Number.isFinite(duration) && duration > 0 ? duration : 0;
  } catch (err) {
    log.warn('could not probe duration', { videoPath, error: err });
    return 0;
  }
}

/**
 * Write one JPEG every `intervalSeconds` to `outputDir/frame_00000.jpg`,
 * `frame_00001.jpg`, ... (0-based, so frame N sits at N × interval seconds).
 * Returns absolute frame paths in order.
 */
export async function sampleFrames(
  videoPath: string,
  outputDir: string,
  intervalSeconds: number,
): Promise<string[]> {
  if (!(intervalSeconds > 0)) throw new RangeError('sampleFrames: intervalSeconds must be > 0');
  const dir = path.resolve(outputDir);
  fs.mkdirSync(dir, { recursive: true });

  await runFfmpeg(
    [
      '-i', videoPath,
      '-vf', `fps=1/${intervalSeconds}`,
      '-q:v', '2',
      '-start_number', '0',
      path.join(dir, 'frame_%05d.jpg'),
    ],
    'sampleFrames',
  );

  const frames = fs
    .readdirSync(dir)
    .filter(f => /^frame_\d{5}\.jpg$/.test(f))
    .sort()
    .map(f => path.join(dir, f));

  log.debug('frame sampling complete', { videoPath, frameCount: frames.length });
  return frames;
}
