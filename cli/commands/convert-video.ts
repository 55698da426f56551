#!/usr/bin/env node
/**
 * Batch-convert MOV/M4V files to web-ready H.264 MP4.
 */

import path from 'path';
import { BitrateSchema, ConfigManager, X264PresetSchema } from '../lib/config';
import { runCommand, runMain, say } from '../lib/command';
import { CrfSchema, PositiveIntSchema, UsageError, parseOption } from '../utils/args';
import { CLIValidator } from '../utils/cli-validation';
import { logger } from '../utils/logger';
import { formatSizeReport } from '../utils/size-stats';
import { probeMedia } from '../services/media/probe';
import { formatClock } from '../services/media/progress';
import { requiredVideoTools, transcodeVideo, VideoEncodeOptions } from '../services/media/video-transcoder';
import { discoverInputs, formatSummary, runBatch } from '../services/batch/batch-runner';

const TAG = 'CONVERT';

const USAGE = [
  'Usage: convert-video [-p preset] [-q quality] [-a audio_bitrate] [-f pattern] [-o output_dir]',
  '  -p: FFmpeg preset (ultrafast to veryslow, default: medium)',
  '  -q: Quality (0-51, lower is better, default: 23)',
  '  -a: Audio bitrate (default: 192k)',
  '  -f: File pattern (default: *.mov)',
  '  -o: Output directory (default: converted)',
  '  --concurrency <n>: Files converted in parallel (default: 1)',
  '  -h: Show this help message',
  '',
  'Examples:',
  '  convert-video                       # Convert all MOV files in current directory',
  '  convert-video -p fast -q 20         # Convert with fast preset and higher quality',
  '  convert-video -f "clip*.m4v"        # Convert specific files',
  '  convert-video -o mp4_videos         # Output to custom directory',
];

/**
 * `<outputDir>/<name>.mp4` for an input path
 */
export function mp4OutputPath(input: string, outputDir: string): string {
  return path.join(outputDir, `${path.parse(input).name}.mp4`);
}

export async function main(argv: string[]): Promise<number> {
  return runCommand(
    {
      tag: TAG,
      usage: USAGE,
      valueOptions: ['-p', '-q', '-a', '-f', '-o', '--concurrency'],
    },
    argv,
    async (args) => {
      const media = await ConfigManager.loadMediaConfig();
      const config = media.convertVideo;

      const presetArg = args.get('-p');
      if (presetArg !== undefined && !X264PresetSchema.safeParse(presetArg).success) {
        throw new UsageError('Invalid preset');
      }
      const preset = presetArg !== undefined ? X264PresetSchema.parse(presetArg) : config.preset;
      const crf = parseOption(CrfSchema, args.get('-q'), config.crf);
      const audioBitrate = parseOption(BitrateSchema, args.get('-a'), config.audioBitrate);
      const pattern = args.get('-f') ?? config.pattern;
      const outputDir = path.resolve(args.get('-o') ?? config.outputDir);
      const concurrency = parseOption(PositiveIntSchema, args.get('--concurrency'), config.concurrency);

      await CLIValidator.requireTools(requiredVideoTools(), media.tools.installHints);

      say(TAG, 'Starting conversion with:');
      say(TAG, `  Preset: ${preset}`);
      say(TAG, `  Quality (CRF): ${crf}`);
      say(TAG, `  Audio bitrate: ${audioBitrate}`);
      say(TAG, `  Pattern: ${pattern}`);
      say(TAG, `  Output directory: ${outputDir}`);
      say(TAG);

      const encode: VideoEncodeOptions = { preset, crf, audioBitrate, faststart: true };
      const files = await discoverInputs({ pattern });

      const summary = await runBatch(
        files,
        async (file) => {
          const info = await probeMedia(file);
          const output = mp4OutputPath(file, outputDir);
          say(TAG, `Converting: ${path.basename(file)}`);
          say(TAG, `Duration: ${formatClock(info.durationSeconds)}`);

          const outputBytes = await transcodeVideo(
            { input: file, output, filters: [], durationSeconds: info.durationSeconds, encode },
            (percent) => logger.progress(percent)
          );
          logger.progress(100, true);
          return { output, outputBytes };
        },
        {
          concurrency,
          onOutcome: (outcome) => {
            if (outcome.status === 'failed') {
              say(TAG, `  Failed to convert ${path.basename(outcome.file)}`);
              return;
            }
            for (const line of formatSizeReport(outcome.originalBytes, outcome.outputBytes, { output: 'Converted size' })) {
              say(TAG, `  ${line}`);
            }
            say(TAG, `  Saved to: ${outcome.output}`);
          },
        }
      );

      say(TAG);
      for (const line of formatSummary(summary, { title: 'Conversion complete!', outputTotal: 'Total converted size', showElapsed: true })) {
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
