#!/usr/bin/env node
/**
 * Compress a single video with one of the named presets
 * (web, fast, hq, mobile, custom), optionally filling an exact frame size.
 */

import fs from 'fs-extra';
import path from 'path';
import { ConfigManager, VideoPreset } from '../lib/config';
import { runCommand, runMain, say } from '../lib/command';
import { ParsedArgs, UsageError } from '../utils/args';
import { CLIValidator } from '../utils/cli-validation';
import { logger } from '../utils/logger';
import { formatSizeReport } from '../utils/size-stats';
import { Dimensions, parseDimensions, planCoverScale } from '../services/media/geometry-planner';
import { MediaInfo, probeMedia } from '../services/media/probe';
import {
  buildCoverFilters,
  buildHeightScaleFilters,
  requiredVideoTools,
  transcodeVideo,
} from '../services/media/video-transcoder';
import { InputNotFoundError } from '../services/batch/batch-runner';

const TAG = 'COMPRESS';

/** Short and long flag for each preset */
export const PRESET_FLAGS: Record<string, string> = {
  '-w': 'web',
  '--web': 'web',
  '-f': 'fast',
  '--fast': 'fast',
  '-h': 'hq',
  '--hq': 'hq',
  '-m': 'mobile',
  '--mobile': 'mobile',
  '-c': 'custom',
  '--custom': 'custom',
};

const USAGE = [
  'Usage: compress-video [option] input_file output_file',
  'Options:',
  '  -w, --web       Optimize for web (good balance of quality and size)',
  '  -f, --fast      Fast compression (lower quality, smaller size)',
  '  -h, --hq        High quality (better quality, larger size)',
  '  -m, --mobile    Optimize for mobile devices',
  '  -c, --custom    Custom compression (1080p, 2mbps)',
  '  --fill WxH      Scale to cover WxH exactly, center-cropping the overflow',
];

/**
 * Picks the preset named by the first preset flag
 */
export function resolvePresetName(args: ParsedArgs): string {
  const flags = Object.keys(PRESET_FLAGS).filter((flag) => args.has(flag));
  if (flags.length === 0) {
    throw new UsageError('A preset option is required');
  }
  const names = new Set(flags.map((flag) => PRESET_FLAGS[flag]));
  if (names.size > 1) {
    throw new UsageError(`Only one preset may be given, got ${flags.join(' ')}`);
  }
  return PRESET_FLAGS[flags[0]];
}

/**
 * Filter chain for a preset: fixed height, or a cover fill when `fill` is given
 */
export function buildPresetFilters(preset: VideoPreset, source: Dimensions, fill?: Dimensions): string[] {
  if (fill) {
    return buildCoverFilters(planCoverScale(source, fill), source, fill);
  }
  return buildHeightScaleFilters(preset.height);
}

function describe(info: MediaInfo): string {
  const audio = info.hasAudio ? `, audio ${info.audioCodec ?? 'unknown'}` : ', no audio';
  return `${info.width}x${info.height}, ${info.durationSeconds.toFixed(2)}s, video ${info.videoCodec ?? 'unknown'}${audio}`;
}

export async function main(argv: string[]): Promise<number> {
  return runCommand(
    {
      tag: TAG,
      usage: USAGE,
      valueOptions: ['--fill'],
      flags: Object.keys(PRESET_FLAGS),
      helpFlags: ['--help'],
    },
    argv,
    async (args) => {
      const presetName = resolvePresetName(args);
      const [input, output] = args.positionals;
      if (!input || !output) {
        throw new UsageError('Input and output files are required');
      }

      const media = await ConfigManager.loadMediaConfig();
      const preset = media.compressVideo.presets[presetName];
      if (!preset) {
        throw new UsageError(`Unknown preset: ${presetName}`);
      }

      const fillArg = args.get('--fill');
      const fill = fillArg !== undefined ? parseDimensions(fillArg) : undefined;

      await CLIValidator.requireTools(requiredVideoTools(), media.tools.installHints);

      if (!(await fs.pathExists(input))) {
        throw new InputNotFoundError(input);
      }

      const originalBytes = (await fs.stat(input)).size;
      const info = await probeMedia(input);
      const filters = buildPresetFilters(preset, info, fill);

      say(TAG, `${preset.description}...`);
      logger.debug('Compression filters', { preset: presetName, filters });

      const outputBytes = await transcodeVideo(
        {
          input,
          output: path.resolve(output),
          filters,
          durationSeconds: info.durationSeconds,
          encode: {
            crf: preset.crf,
            videoBitrate: preset.videoBitrate,
            audioBitrate: preset.audioBitrate,
            faststart: preset.faststart,
            profile: preset.profile,
            level: preset.level,
          },
        },
        (percent) => logger.progress(percent)
      );
      logger.progress(100, true);

      say(TAG, 'Compression completed!');
      for (const line of formatSizeReport(originalBytes, outputBytes)) {
        say(TAG, line);
      }

      const result = await probeMedia(output);
      say(TAG);
      say(TAG, 'New video information:');
      say(TAG, `  ${describe(result)}`);
      return 0;
    }
  );
}

if (require.main === module) {
  runMain(main);
}

export default main;
