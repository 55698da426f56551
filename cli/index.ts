#!/usr/bin/env node
/**
 * media-squeeze <command> [options]
 */

import { CommandMain, loadEnv } from './lib/command';
import compressImages from './commands/compress-images';
import compressVideo from './commands/compress-video';
import convertVideo from './commands/convert-video';
import cropVideo from './commands/crop-video';
import heicToJpg from './commands/heic-to-jpg';
import rawToJpg from './commands/raw-to-jpg';
import toWebp from './commands/to-webp';

export const COMMANDS: Record<string, { run: CommandMain; summary: string }> = {
  'crop-video': { run: cropVideo, summary: 'Crop and resize videos into fixed-size renditions plus a thumbnail' },
  'compress-video': { run: compressVideo, summary: 'Compress one video with a named preset' },
  'convert-video': { run: convertVideo, summary: 'Batch-convert MOV/M4V files to MP4' },
  'compress-images': { run: compressImages, summary: 'Batch-compress JPEGs for the web' },
  'to-webp': { run: toWebp, summary: 'Batch-convert images to WebP' },
  'raw-to-jpg': { run: rawToJpg, summary: 'Develop CR2 RAW files into JPEGs' },
  'heic-to-jpg': { run: heicToJpg, summary: 'Convert HEIC photos to JPEGs' },
};

export function printHelp(): void {
  console.log('Usage: media-squeeze <command> [options]');
  console.log('');
  console.log('Commands:');
  const width = Math.max(...Object.keys(COMMANDS).map((name) => name.length));
  for (const [name, { summary }] of Object.entries(COMMANDS)) {
    console.log(`  ${name.padEnd(width)}  ${summary}`);
  }
  console.log('');
  console.log('Run `media-squeeze <command> --help` for command options.');
}

export async function dispatch(argv: string[]): Promise<number> {
  const [name, ...rest] = argv;
  if (!name || name === '--help' || name === '-h') {
    printHelp();
    return name ? 0 : 1;
  }

  const command = COMMANDS[name];
  if (!command) {
    console.error(`Unknown command: ${name}`);
    printHelp();
    return 1;
  }
  return command.run(rest);
}

if (require.main === module) {
  loadEnv();
  dispatch(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
