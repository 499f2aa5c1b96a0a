/**
 * Frame sampler — one JPEG every `intervalSeconds` for every source video,
 * plus the metadata catalog describing them.
 *
 * Videos run through a bounded worker pool. Each video's failure is caught
 * inside its own task and reported in `failed_videos.json`; it never stops
 * the others.
 */
import * as path from 'path';
import { ARTIFACTS, SAMPLER_EXTENSIONS } from '../config.js';
import { probeDuration, sampleFrames } from '../media/ffmpeg.js';
import { errorMessage } from '../utils/errors.js';
import { writeJsonFile } from '../utils/files.js';
import { createLogger } from '../utils/logger.js';
import { runWithConcurrency } from '../utils/pool.js';
import { listVideoFiles } from './metadata.js';

const log = createLogger('Sampler');

// ── Types ─────────────────────────────────────────────────────────────────────

export interface SampledFrame {
  frame_index: number;
  timestamp_sec: number;
  path: string;
}

export interface SampledVideo {
  video_name: string;
  video_path: string;
  duration_sec: number;
  sampling_interval: number;
  expected_frames: number;
  sampled_frames: number;
  frame_dir: string;
  frames: SampledFrame[];
}

export interface FailedVideo {
  video_name: string;
  path: string;
  reason: string;
}

export interface SampleOptions {
  inputDir: string;
  framesDir: string;
  metadataPath: string;
  intervalSeconds: number;
  minDuration: number;
  workers: number;
}

export interface SamplerDeps {
  probe?: (videoPath: string) => Promise<number>;
  extract?: (videoPath: string, outputDir: string, intervalSeconds: number) => Promise<string[]>;
}

export interface SampleResult {
  sampled: SampledVideo[];
  failed: FailedVideo[];
  failedPath: string;
}

type VideoOutcome = { ok: true; video: SampledVideo } | { ok: false; failure: FailedVideo };

// ── Per-video task ────────────────────────────────────────────────────────────

async function sampleOne(
  videoPath: string,
  opts: SampleOptions,
  probe: NonNullable<SamplerDeps['probe']>,
  extract: NonNullable<SamplerDeps['extract']>,
): Promise<VideoOutcome> {
  const videoName = path.parse(videoPath).name;
  const fail = (reason: string): VideoOutcome => ({ ok: false, failure: { video_name: videoName, path: videoPath, reason } });

  try {
    const duration = await probe(videoPath);
    if (duration <= 0) return fail('Cannot open video');
    if (duration < opts.minDuration) {
      return fail(`Video duration (${duration.toFixed(2)}s) is less than minimum (${opts.minDuration}s)`);
    }

    const frameDir = path.resolve(opts.framesDir, videoName);
    const framePaths = await extract(videoPath, frameDir, opts.intervalSeconds);
    const frames = framePaths.map((p, i) => ({
      frame_index:   i,
      timestamp_sec: i * opts.intervalSeconds,
      path:          p,
    }));

    return {
      ok: true,
      video: {
        video_name:        videoName,
        video_path:        videoPath,
        duration_sec:      duration,
        sampling_interval: opts.intervalSeconds,
        expected_frames:   Math.floor(duration / opts.intervalSeconds) + 1,
        sampled_frames:    frames.length,
        frame_dir:         frameDir,
        frames,
      },
    };
  } catch (err) {
    log.warn('video failed', { videoPath, error: err });
    return fail(errorMessage(err));
  }
}

// ── Public API ─────────────────────────────────────────────────────────────────

export async function sampleVideos(opts: SampleOptions, deps: SamplerDeps = {}): Promise<SampleResult> {
  const probe = deps.probe ?? probeDuration;
  const extract = deps.extract ?? sampleFrames;
  const root = path.resolve(opts.inputDir);
  const failedPath = path.join(path.dirname(path.resolve(opts.metadataPath)), ARTIFACTS.failedVideos);

  const files = listVideoFiles(root, SAMPLER_EXTENSIONS);
  if (files.length === 0) {
    log.warn('no MP4 files found, writing empty metadata', { inputDir: root });
    writeJsonFile(opts.metadataPath, []);
    return { sampled: [], failed: [], failedPath };
  }

  log.info('processing videos', { count: files.length, workers: opts.workers });

  const tasks = files.map(file => () => sampleOne(path.join(root, file), opts, probe, extract));
  const outcomes = await runWithConcurrency(tasks, opts.workers, (done, total) => {
    if (done % 50 === 0 || done === total) log.info(`processed ${done}/${total} videos`);
  });

  const sampled: SampledVideo[] = [];
  const failed: FailedVideo[] = [];
  for (const outcome of outcomes) {
    if (outcome.ok) sampled.push(outcome.video);
    else failed.push(outcome.failure);
  }

  writeJsonFile(opts.metadataPath, sampled);
  writeJsonFile(failedPath, { failed_videos: failed });

  log.info('sampling complete', {
    succeeded: sampled.length,
    failed: failed.length,
    metadataPath: path.resolve(opts.metadataPath),
    failedPath,
  });
  return { sampled, failed, failedPath };
}
