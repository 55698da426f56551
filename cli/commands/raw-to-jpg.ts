#!/usr/bin/env node
/**
 * Develop camera RAW files (CR2 by default) into JPEGs next to the originals.
 */

import path from 'path';
import { ConfigManager } from '../lib/config';
import { runCommand, runMain, say } from '../lib/command';
import { QualitySchema, UsageError, parseOption } from '../utils/args';
import { CLIValidator } from '../utils/cli-validation';
import { convertRawToJpeg } from '../services/media/image-transcoder';
import { discoverInputs, runBatch } from '../services/batch/batch-runner';

const TAG = 'RAW';

const USAGE = [
  'Usage: raw-to-jpg [-q quality] input',
  '  input: CR2 file or directory containing CR2 files',
  '  -q: JPEG quality (1-100, default: 90)',
  '',
  'Examples:',
  '  raw-to-jpg image.CR2',
  '  raw-to-jpg -q 95 image.CR2',
  '  raw-to-jpg directory_path',
];

/**
 * `<dir>/<name>.jpg` beside the input
 */
export function siblingJpegPath(input: string): string {
  const { dir, name } = path.parse(input);
  return path.join(dir, `${name}.jpg`);
}

export async function main(argv: string[]): Promise<number> {
  return runCommand(
    { tag: TAG, usage: USAGE, valueOptions: ['-q'] },
    argv,
    async (args) => {
      const media = await ConfigManager.loadMediaConfig();
      const quality = parseOption(QualitySchema, args.get('-q'), media.raw.quality);

      const input = args.positionals[0];
      if (!input) {
        throw new UsageError('An input file or directory is required');
      }

      await CLIValidator.requireTools(['dcraw'], media.tools.installHints);

      const files = await discoverInputs({ input, extensions: media.raw.extensions });
      if (files.length > 1 || files[0] !== path.resolve(input)) {
        say(TAG, `Converting all ${media.raw.extensions.join('/').toUpperCase()} files in ${input}...`);
      }

      const summary = await runBatch(
        files,
        async (file) => {
          const output = siblingJpegPath(file);
          say(TAG, `Converting: ${path.basename(file)} -> ${path.basename(output)}`);
          return { output, outputBytes: await convertRawToJpeg(file, output, { quality }) };
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
