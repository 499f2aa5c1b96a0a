/**
 * Catalog generation — probe every video in a directory and write the
 * `video_metadata.json` the planner reads.
 */
import * as fs from 'fs';
import * as path from 'path';
import { VIDEO_EXTENSIONS } from '../config.js';
import { probeDuration } from '../media/ffmpeg.js';
import { InvalidInputError } from '../utils/errors.js';
import { writeJsonFile } from '../utils/files.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('Metadata');

export interface VideoMetadataEntry {
  video_name: string;
  duration_sec: number;
  video_path: string;
}

export interface MetadataDeps {
  probe?: (videoPath: string) => Promise<number>;
}

/** Sorted file names in `dir` whose extension (case-insensitive) is in `extensions`. */
export function listVideoFiles(dir: string, extensions: readonly string[]): string[] {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw new InvalidInputError(`Input directory does not exist: ${dir}`);
  }
  return fs
    .readdirSync(dir)
    .filter(f => extensions.includes(path.extname(f).toLowerCase()))
    .sort();
}

/**
 * Probe each video sequentially, drop anything shorter than `minDuration`
 * (unprobeable files report 0 and are dropped too), write the catalog.
 */
export async function generateVideoMetadata(
  inputDir: string,
  outputFile: string,
  minDuration = 2.0,
  deps: MetadataDeps = {},
): Promise<VideoMetadataEntry[]> {
  const probe = deps.probe ?? probeDuration;
  const root = path.resolve(inputDir);
  const files = listVideoFiles(root, VIDEO_EXTENSIONS);

  if (files.length === 0) {
    log.warn('no video files found, writing an empty catalog', { inputDir: root });
    writeJsonFile(outputFile, []);
    return [];
  }

  log.info('found video files', { count: files.length, inputDir: root });

  const entries: VideoMetadataEntry[] = [];
  for (const [i, file] of files.entries()) {
    const videoPath = path.join(root, file);
    const duration = await probe(videoPath);
    if (duration < minDuration) {
      log.info(`skipping ${file}`, { duration, minDuration, progress: `${i + 1}/${files.length}` });
      continue;
    }
    entries.push({
      video_name:   path.parse(file).name,
      duration_sec: duration,
      video_path:   videoPath,
    });
  }

  writeJsonFile(outputFile, entries);
  log.info('metadata file written', { outputFile, videos: entries.length });
  return entries;
}
