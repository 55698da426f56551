#!/usr/bin/env node
/**
 * Convert HEIC/HEIF photos into JPEGs next to the originals.
 */

import path from 'path';
import { ConfigManager } from '../lib/config';
import { runCommand, runMain, say } from '../lib/command';
import { QualitySchema, UsageError, parseOption } from '../utils/args';
import { CLIValidator } from '../utils/cli-validation';
import { convertHeicToJpeg } from '../services/media/image-transcoder';
import { discoverInputs, runBatch } from '../services/batch/batch-runner';
import { siblingJpegPath } from './raw-to-jpg';

const TAG = 'HEIC';

const USAGE = [
  'Usage: heic-to-jpg [-q quality] <file.HEIC | directory>',
  '  -q: JPEG quality (1-100, default: heif-convert default)',
];

export async function main(argv: string[]): Promise<number> {
  return runCommand(
    { tag: TAG, usage: USAGE, valueOptions: ['-q'] },
    argv,
    async (args) => {
      const media = await ConfigManager.loadMediaConfig();
      const quality = parseOption(QualitySchema.optional(), args.get('-q'), media.heic.quality);

      const input = args.positionals[0];
      if (!input) {
        throw new UsageError('An input file or directory is required');
      }

      await CLIValidator.requireTools(['heif-convert'], media.tools.installHints);

      const files = await discoverInputs({ input, extensions: media.heic.extensions });
      if (files.length > 1 || files[0] !== path.resolve(input)) {
        say(TAG, `Converting all HEIC files in ${input}...`);
      }

      const summary = await runBatch(
        files,
        async (file) => {
          const output = siblingJpegPath(file);
          say(TAG, `Converting: ${path.basename(file)} -> ${path.basename(output)}`);
          return { output, outputBytes: await convertHeicToJpeg(file, output, { quality }) };
        },
        {
          onOutcome: (outcome) => {
            if (outcome.status === 'ok') {
              say(TAG, `Successfully converted ${path.basename(outcome.file)}`);
            } else {
              say(TAG, `Failed to convert ${path.basename(outcome.file)}: ${outcome.error}`);
            }
          },
        }
      );

      say(TAG, 'Conversion complete!');
      say(TAG, `Successfully converted: ${summary.processed} files`);
      if (summary.failed > 0) {
        say(TAG, `Failed conversions: ${summary.failed} files`);
      }
      return summary.failed > 0 ? 1 : 0;
    }
  );
}

if (require.main === module) {
  runMain(main);
}

export default main;
