#!/usr/bin/env node
/**
 * Crop and resize videos into fixed-size renditions (mobile 500x700 and
 * tablet 800x700 by default) plus a WebP thumbnail.
 *
 * Each rendition is center-cropped to its aspect ratio, then scaled to the
 * exact size. The thumbnail reuses the crop computed for its rendition.
 */

import path from 'path';
import { ConfigManager, MediaConfig } from '../lib/config';
import { runCommand, runMain, say } from '../lib/command';
import { CrfSchema, ParsedArgs, PositiveIntSchema, UsageError, parseOption } from '../utils/args';
import { CLIValidator } from '../utils/cli-validation';
import { logger } from '../utils/logger';
import { humanSize } from '../utils/size-stats';
import {
  CropRegion,
  Dimensions,
  parseDimensions,
  planCropThenScale,
} from '../services/media/geometry-planner';
import { probeMedia } from '../services/media/probe';
import {
  buildCropScaleFilters,
  extractThumbnail,
  requiredVideoTools,
  transcodeVideo,
} from '../services/media/video-transcoder';
import { discoverInputs, formatSummary, runBatch } from '../services/batch/batch-runner';

const TAG = 'CROP';

const USAGE = [
  'Usage: crop-video [options] [input-file]',
  '  input-file              Video to process (default: every mp4/mov/mkv in ./input)',
  '  -o, --output-dir <dir>  Output directory (default: ./output)',
  '  --crf <0-51>            Constant Rate Factor (default: 23)',
  '  --renditions <list>     name=WxH pairs, e.g. mobile=500x700,tablet=800x700',
  '  --concurrency <n>       Files processed in parallel (default: 1)',
  '  --verbose               Debug logging',
];

export interface Rendition {
  name: string;
  size: Dimensions;
}

export interface RenditionPlan extends Rendition {
  crop: CropRegion;
  filters: string[];
  output: string;
}

/**
 * Parses `name=WxH,name=WxH`
 */
export function parseRenditions(value: string): Rendition[] {
  const renditions = value
    .split(',')
    .map((part) => part.trim())
    .filter(Boolean)
    .map((part) => {
      const eq = part.indexOf('=');
      if (eq <= 0) {
        throw new UsageError(`Invalid rendition "${part}", expected name=WxH`);
      }
      return { name: part.slice(0, eq), size: parseDimensions(part.slice(eq + 1)) };
    });

  if (renditions.length === 0) {
    throw new UsageError('At least one rendition is required');
  }
  return renditions;
}

/**
 * Geometry and output path of every rendition for one source
 */
export function planRenditions(
  source: Dimensions,
  renditions: Rendition[],
  outputDir: string,
  baseName: string
): RenditionPlan[] {
  return renditions.map((rendition) => {
    const plan = planCropThenScale(source, rendition.size);
    return {
      ...rendition,
      crop: plan.crop,
      filters: buildCropScaleFilters(plan.crop, source, plan.scaleTo),
      output: path.join(outputDir, `${baseName}_${rendition.name}.mp4`),
    };
  });
}

/**
 * The rendition whose crop and size the thumbnail reuses
 */
export function pickThumbnailRendition(plans: RenditionPlan[], preferred: string): RenditionPlan {
  const match = plans.find((p) => p.name === preferred) ?? plans[0];
  if (!match) {
    throw new UsageError('At least one rendition is required');
  }
  return match;
}

interface CropVideoSettings {
  outputDir: string;
  crf: number;
  renditions: Rendition[];
  config: MediaConfig['cropVideo'];
}

async function processVideo(input: string, settings: CropVideoSettings): Promise<number> {
  const { config } = settings;
  const baseName = path.parse(input).name;
  say(TAG, `Processing: ${path.basename(input)}`);

  const info = await probeMedia(input);
  const source: Dimensions = { width: info.width, height: info.height };
  const plans = planRenditions(source, settings.renditions, settings.outputDir, baseName);

  const sizes: Array<{ label: string; bytes: number }> = [{ label: 'Original', bytes: info.sizeBytes }];
  let outputBytes = 0;

  for (const plan of plans) {
    say(TAG, `Creating ${plan.name} version...`);
    say(TAG, `Input dimensions: ${source.width}x${source.height}`);
    say(TAG, `Target dimensions: ${plan.size.width}x${plan.size.height}`);
    say(TAG, `Crop dimensions: ${plan.crop.width}x${plan.crop.height}`);

    const bytes = await transcodeVideo(
      {
        input,
        output: plan.output,
        filters: plan.filters,
        durationSeconds: info.durationSeconds,
        encode: {
          crf: settings.crf,
          preset: config.preset,
          profile: 'high',
          level: '4.0',
          audioBitrate: config.audioBitrate,
          faststart: true,
        },
      },
      (percent) => logger.progress(percent)
    );
    logger.progress(100, true);
    say(TAG, `Completed: ${plan.output}`);

    sizes.push({ label: plan.name, bytes });
    outputBytes += bytes;
  }

  const thumbPlan = pickThumbnailRendition(plans, config.thumbnail.rendition);
  const thumbPath = path.join(settings.outputDir, `${baseName}_thumb.webp`);
  say(TAG, 'Generating WebP thumbnail...');
  const thumbBytes = await extractThumbnail(input, thumbPath, source, {
    crop: thumbPlan.crop,
    size: thumbPlan.size,
    atSeconds: info.durationSeconds > 0 ? Math.min(config.thumbnail.atSeconds, info.durationSeconds / 2) : 0,
    quality: config.thumbnail.quality,
  });
  sizes.push({ label: 'thumbnail', bytes: thumbBytes });

  say(TAG);
  say(TAG, 'File sizes:');
  for (const { label, bytes } of sizes) {
    say(TAG, `  ${label}: ${humanSize(bytes)}`);
  }

  return outputBytes;
}

export async function main(argv: string[]): Promise<number> {
  return runCommand(
    {
      tag: TAG,
      usage: USAGE,
      valueOptions: ['-o', '--output-dir', '--crf', '--renditions', '--concurrency'],
    },
    argv,
    async (args: ParsedArgs) => {
      const media = await ConfigManager.loadMediaConfig();
      const config = media.cropVideo;

      const renditionsArg = args.get('--renditions');
      const settings: CropVideoSettings = {
        outputDir: path.resolve(args.get('-o', '--output-dir') ?? config.outputDir),
        crf: parseOption(CrfSchema, args.get('--crf'), config.crf),
        renditions: renditionsArg !== undefined
          ? parseRenditions(renditionsArg)
          : Object.entries(config.renditions).map(([name, size]) => ({ name, size })),
        config,
      };
      const concurrency = parseOption(PositiveIntSchema, args.get('--concurrency'), 1);

      await CLIValidator.requireTools(requiredVideoTools(), media.tools.installHints);

      const input = args.positionals[0];
      const files = input
        ? await discoverInputs({ input })
        : await discoverInputs({ input: config.inputDir, extensions: config.extensions });

      if (files.length === 0) {
        say(TAG, `No videos found in ${config.inputDir}`);
        return 0;
      }

      const summary = await runBatch(
        files,
        async (file) => ({ output: settings.outputDir, outputBytes: await processVideo(file, settings) }),
        { concurrency }
      );

      say(TAG);
      for (const line of formatSummary(summary, { title: 'Processing complete!', outputTotal: 'Total rendition size', showElapsed: true })) {
        say(TAG, line);
      }
      return summary.failed > 0 ? 1 : 0;
    }
  );
}

if (require.main === module) {
  runMain(main);
}

export default main;
