#!/usr/bin/env node
/**
 * Batch-convert images (JPEG by default) to WebP.
 */

import path from 'path';
import { ConfigManager } from '../lib/config';
import { runCommand, runMain, say } from '../lib/command';
import { PositiveIntSchema, QualitySchema, parseOption } from '../utils/args';
import { formatSizeReport } from '../utils/size-stats';
import { convertToWebp } from '../services/media/image-transcoder';
import { discoverInputs, formatSummary, runBatch } from '../services/batch/batch-runner';

const TAG = 'WEBP';

const USAGE = [
  'Usage: to-webp [-q quality] [-p pattern] [-o output_dir]',
  '  -q: WebP quality (1-100, default: 82)',
  '  -p: File pattern (default: *.jpg)',
  '  -o: Output directory (default: webp)',
  '  --concurrency <n>: Images processed in parallel (default: 2)',
  '  -h: Show this help message',
  '',
  'Examples:',
  '  to-webp                     # Convert all JPGs in current directory',
  '  to-webp -q 85               # Convert with quality 85',
  '  to-webp -p "cover-*.jpg"    # Convert specific files',
  '  to-webp -o webp_converted   # Output to custom directory',
];

export function webpOutputPath(input: string, outputDir: string): string {
  return path.join(outputDir, `${path.parse(input).name}.webp`);
}

export async function main(argv: string[]): Promise<number> {
  return runCommand(
    {
      tag: TAG,
      usage: USAGE,
      valueOptions: ['-q', '-p', '-o', '--concurrency'],
    },
    argv,
    async (args) => {
      const media = await ConfigManager.loadMediaConfig();
      const config = media.webp;

      const quality = parseOption(QualitySchema, args.get('-q'), config.quality);
      const pattern = args.get('-p') ?? config.pattern;
      const outputDir = path.resolve(args.get('-o') ?? config.outputDir);
      const concurrency = parseOption(PositiveIntSchema, args.get('--concurrency'), config.concurrency);

      say(TAG, 'Starting conversion with:');
      say(TAG, `  Quality: ${quality}`);
      say(TAG, `  Pattern: ${pattern}`);
      say(TAG, `  Output directory: ${outputDir}`);
      say(TAG);

      const files = await discoverInputs({ pattern });
      const summary = await runBatch(
        files,
        async (file) => {
          const output = webpOutputPath(file, outputDir);
          say(TAG, `Converting: ${path.basename(file)}`);
          return { output, outputBytes: await convertToWebp(file, output, { quality }) };
        },
        {
          concurrency,
          onOutcome: (outcome) => {
            if (outcome.status === 'failed') {
              say(TAG, `  Failed to convert ${path.basename(outcome.file)}`);
              return;
            }
            const labels = { original: 'Original size', output: 'WebP size' };
            for (const line of formatSizeReport(outcome.originalBytes, outcome.outputBytes, labels)) {
              say(TAG, `  ${line}`);
            }
            say(TAG, `  Saved to: ${outcome.output}`);
          },
        }
      );

      say(TAG);
      for (const line of formatSummary(summary, { title: 'Conversion complete!', outputTotal: 'Total WebP size' })) {
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
