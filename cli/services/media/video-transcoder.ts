/**
 * Video transcoding through fluent-ffmpeg.
 *
 * Geometry arrives as explicit values (crop regions, cover plans); nothing
 * here remembers a filter between calls, so a thumbnail and the rendition it
 * belongs to are always cut with the crop they were handed.
 */

import ffmpeg from 'fluent-ffmpeg';
import fs from 'fs-extra';
import path from 'path';
import { X264Preset } from '../../lib/config';
import { logger } from '../../utils/logger';
import { AUTO, CoverScalePlan, CropRegion, Dimensions, isFullFrame, resolveCoverPlan } from './geometry-planner';
import { parseTimemark, progressPercent } from './progress';

if (process.env.FFMPEG_PATH) {
  ffmpeg.setFfmpegPath(process.env.FFMPEG_PATH);
}

export interface VideoEncodeOptions {
  crf?: number;
  /** Target bitrate such as `2M`; takes the place of crf */
  videoBitrate?: string;
  preset?: X264Preset;
  audioBitrate: string;
  faststart?: boolean;
  profile?: string;
  level?: string;
}

export interface VideoJob {
  input: string;
  output: string;
  filters: string[];
  encode: VideoEncodeOptions;
  /** Probed duration, used for progress percentages */
  durationSeconds?: number;
}

export interface ThumbnailOptions {
  crop: CropRegion | null;
  size: Dimensions;
  atSeconds?: number;
  quality?: number;
}

export class TranscodeError extends Error {
  readonly code = 'TRANSCODE_FAILED';

  constructor(message: string, public readonly input: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TranscodeError';
  }
}

export type ProgressListener = (percent: number) => void;

export function cropFilter(crop: CropRegion): string {
  return `crop=${crop.width}:${crop.height}:${crop.x}:${crop.y}`;
}

export function scaleFilter(width: number | typeof AUTO, height: number | typeof AUTO, autoValue = -1): string {
  const w = width === AUTO ? autoValue : width;
  const h = height === AUTO ? autoValue : height;
  return `scale=${w}:${h}`;
}

/**
 * Crop-then-scale chain. A crop covering the full frame is left out.
 */
export function buildCropScaleFilters(crop: CropRegion, source: Dimensions, scaleTo: Dimensions): string[] {
  const filters: string[] = [];
  if (!isFullFrame(crop, source)) {
    filters.push(cropFilter(crop));
  }
  filters.push(scaleFilter(scaleTo.width, scaleTo.height));
  return filters;
}

/**
 * Cover chain: scale with one derived axis, then trim to the target.
 * ffmpeg's crop without offsets centers the window. An exact fit has no crop.
 */
export function buildCoverFilters(plan: CoverScalePlan, source: Dimensions, target: Dimensions): string[] {
  const filters = [scaleFilter(plan.scaleWidth, plan.scaleHeight)];
  if (resolveCoverPlan(source, target, plan).crop !== null) {
    filters.push(`crop=${target.width}:${target.height}`);
  }
  return filters;
}

/**
 * Fixed-height downscale keeping the width even, as libx264 requires
 */
export function buildHeightScaleFilters(height: number): string[] {
  return [scaleFilter(AUTO, height, -2)];
}

/**
 * Output options for an H.264/AAC MP4
 */
export function buildEncodeOptions(encode: VideoEncodeOptions): string[] {
  const options = ['-c:v', 'libx264'];

  if (encode.preset) {
    options.push('-preset', encode.preset);
  }
  if (encode.videoBitrate) {
    options.push('-b:v', encode.videoBitrate);
  } else {
    options.push('-crf', String(encode.crf ?? 23));
  }
  if (encode.profile) {
    options.push('-profile:v', encode.profile);
  }
  if (encode.level) {
    options.push('-level', encode.level);
  }

  options.push('-c:a', 'aac', '-b:a', encode.audioBitrate);

  if (encode.faststart) {
    options.push('-movflags', '+faststart');
  }
  return options;
}

/**
 * Output options for a single WebP frame
 */
export function buildThumbnailOptions(quality: number): string[] {
  return ['-frames:v', '1', '-c:v', 'libwebp', '-quality', String(quality)];
}

async function outputSize(output: string): Promise<number> {
  const stat = await fs.stat(output);
  return stat.size;
}

/**
 * Run one transcode and resolve with the output size in bytes
 */
export async function transcodeVideo(job: VideoJob, onProgress?: ProgressListener): Promise<number> {
  await fs.ensureDir(path.dirname(job.output));

  const outputOptions = buildEncodeOptions(job.encode);
  logger.debug(`ffmpeg ${job.input} -> ${job.output}`, { filters: job.filters, outputOptions });

  await new Promise<void>((resolve, reject) => {
    const command = ffmpeg(job.input)
      .outputOptions(['-y', ...outputOptions])
      .on('progress', (progress: { timemark?: string }) => {
        if (!onProgress || !job.durationSeconds || !progress.timemark) return;
        const seconds = parseTimemark(progress.timemark);
        if (seconds !== null) {
          onProgress(progressPercent(seconds, job.durationSeconds));
        }
      })
      .on('end', () => resolve())
      .on('error', (err: Error) => {
        reject(new TranscodeError(`ffmpeg failed for ${job.input}: ${err.message}`, job.input, { cause: err }));
      });

    if (job.filters.length > 0) {
      command.videoFilters(job.filters);
    }

    command.save(job.output);
  });

  return outputSize(job.output);
}

/**
 * Grab one frame as WebP using the crop the caller computed for this source
 */
export async function extractThumbnail(
  input: string,
  output: string,
  source: Dimensions,
  options: ThumbnailOptions
): Promise<number> {
  const { crop, size, atSeconds = 1, quality = 80 } = options;
  await fs.ensureDir(path.dirname(output));

  const filters = crop
    ? buildCropScaleFilters(crop, source, size)
    : [scaleFilter(size.width, size.height)];

  await new Promise<void>((resolve, reject) => {
    ffmpeg(input)
      .seekInput(atSeconds)
      .videoFilters(filters)
      .outputOptions(['-y', ...buildThumbnailOptions(quality)])
      .on('end', () => resolve())
      .on('error', (err: Error) => {
        reject(new TranscodeError(`Thumbnail extraction failed for ${input}: ${err.message}`, input, { cause: err }));
      })
      .save(output);
  });

  return outputSize(output);
}

/**
 * Tools that must be on PATH before running ffmpeg jobs
 */
export function requiredVideoTools(): string[] {
  return process.env.FFMPEG_PATH ? [] : ['ffmpeg'];
}
