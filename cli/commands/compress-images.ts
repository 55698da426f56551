#!/usr/bin/env node
/**
 * Batch-compress images to progressive web JPEGs with a bounded size.
 */

import path from 'path';
import { ConfigManager } from '../lib/config';
import { runCommand, runMain, say } from '../lib/command';
import { PositiveIntSchema, QualitySchema, WidthSchema, parseOption } from '../utils/args';
import { formatSizeReport } from '../utils/size-stats';
import { compressImage } from '../services/media/image-transcoder';
import { discoverInputs, formatSummary, runBatch } from '../services/batch/batch-runner';

const TAG = 'IMAGES';

const USAGE = [
  'Usage: compress-images [-q quality] [-w max_width] [-p pattern] [-o output_dir]',
  '  -q: JPEG quality (1-100, default: 82)',
  '  -w: Maximum width in pixels (default: 1920)',
  '  -p: File pattern (default: *.jpg)',
  '  -o: Output directory (default: compressed)',
  '  --concurrency <n>: Images processed in parallel (default: 2)',
  '  -h: Show this help message',
  '',
  'Example:',
  '  compress-images -q 85 -w 1600 -p "cover-*.jpg" -o compressed',
];

/**
 * Output keeps the file name; non-JPEG inputs get a `.jpg` extension
 */
export function jpegOutputPath(input: string, outputDir: string): string {
  const { name, ext } = path.parse(input);
  const keep = /^\.jpe?g$/i.test(ext);
  return path.join(outputDir, keep ? `${name}${ext}` : `${name}.jpg`);
}

export async function main(argv: string[]): Promise<number> {
  return runCommand(
    {
      tag: TAG,
      usage: USAGE,
      valueOptions: ['-q', '-w', '-p', '-o', '--concurrency'],
    },
    argv,
    async (args) => {
      const media = await ConfigManager.loadMediaConfig();
      const config = media.compressImages;

      const quality = parseOption(QualitySchema, args.get('-q'), config.quality);
      const maxWidth = parseOption(WidthSchema, args.get('-w'), config.maxWidth);
      const pattern = args.get('-p') ?? config.pattern;
      const outputDir = path.resolve(args.get('-o') ?? config.outputDir);
      const concurrency = parseOption(PositiveIntSchema, args.get('--concurrency'), config.concurrency);

      say(TAG, 'Starting compression with:');
      say(TAG, `  Quality: ${quality}`);
      say(TAG, `  Max width: ${maxWidth}`);
      say(TAG, `  Pattern: ${pattern}`);
      say(TAG, `  Output directory: ${outputDir}`);
      say(TAG);

      const files = await discoverInputs({ pattern });
      const summary = await runBatch(
        files,
        async (file) => {
          const output = jpegOutputPath(file, outputDir);
          say(TAG, `Processing: ${path.basename(file)}`);
          return { output, outputBytes: await compressImage(file, output, { quality, maxWidth }) };
        },
        {
          concurrency,
          onOutcome: (outcome) => {
            if (outcome.status === 'failed') {
              say(TAG, `  Failed to compress ${path.basename(outcome.file)}`);
              return;
            }
            for (const line of formatSizeReport(outcome.originalBytes, outcome.outputBytes, { output: 'Compressed size' })) {
              say(TAG, `  ${line}`);
            }
            say(TAG, `  Saved to: ${outcome.output}`);
          },
        }
      );

      say(TAG);
      for (const line of formatSummary(summary, { title: 'Compression complete!', outputTotal: 'Total compressed size' })) {
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
