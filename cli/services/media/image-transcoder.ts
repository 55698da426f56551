import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { CLIExecutor } from '../../utils/cli-executor';
import { logger } from '../../utils/logger';
import { TranscodeError } from './video-transcoder';

export interface CompressImageOptions {
  quality: number;
  /** Longest edge limit; smaller images are never enlarged */
  maxWidth: number;
}

export interface WebpOptions {
  quality: number;
}

export interface JpegOptions {
  quality?: number;
}

async function outputSize(output: string): Promise<number> {
  const stat = await fs.stat(output);
  return stat.size;
}

function wrap(input: string, step: string, error: unknown): TranscodeError {
  const message = error instanceof Error ? error.message : String(error);
  return new TranscodeError(`${step} failed for ${input}: ${message}`, input, { cause: error });
}

/**
 * Web-friendly JPEG: auto-oriented, bounded to `maxWidth` on both edges,
 * sRGB, progressive, 4:2:0, metadata dropped
 */
export async function compressImage(input: string, output: string, options: CompressImageOptions): Promise<number> {
  await fs.ensureDir(path.dirname(output));
  try {
    await sharp(input)
      .rotate()
      .resize({
        width: options.maxWidth,
        height: options.maxWidth,
        fit: 'inside',
        withoutEnlargement: true,
      })
      .toColourspace('srgb')
      .jpeg({
        quality: options.quality,
        progressive: true,
        chromaSubsampling: '4:2:0',
      })
      .toFile(output);
  } catch (error) {
    throw wrap(input, 'Compression', error);
  }
  return outputSize(output);
}

/**
 * Re-encode any sharp-readable image as WebP
 */
export async function convertToWebp(input: string, output: string, options: WebpOptions): Promise<number> {
  await fs.ensureDir(path.dirname(output));
  try {
    await sharp(input).rotate().webp({ quality: options.quality }).toFile(output);
  } catch (error) {
    throw wrap(input, 'WebP conversion', error);
  }
  return outputSize(output);
}

/**
 * Develop a camera RAW file: dcraw (camera white balance, brightness 2.0,
 * AHD interpolation) to a temporary TIFF, then sharpen, stretch levels and
 * encode as JPEG.
 */
export async function convertRawToJpeg(input: string, output: string, options: JpegOptions = {}): Promise<number> {
  const { quality = 90 } = options;
  const tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'raw-develop-'));
  const tiffPath = path.join(tmpDir, `${path.parse(input).name}.tiff`);

  try {
    try {
      await CLIExecutor.executeToFile('dcraw', ['-c', '-w', '-b', '2.0', '-q', '3', '-T', input], tiffPath);
    } catch (error) {
      throw wrap(input, 'dcraw', error);
    }

    await fs.ensureDir(path.dirname(output));
    try {
      await sharp(tiffPath)
        .sharpen({ sigma: 1 })
        .normalise()
        .jpeg({ quality })
        .toFile(output);
    } catch (error) {
      throw wrap(input, 'JPEG encoding', error);
    }
  } finally {
    await fs.remove(tmpDir);
    logger.debug(`Removed temporary TIFF for ${input}`);
  }

  return outputSize(output);
}

/**
 * HEIC/HEIF to JPEG through heif-convert
 */
export async function convertHeicToJpeg(input: string, output: string, options: JpegOptions = {}): Promise<number> {
  await fs.ensureDir(path.dirname(output));
  const args = options.quality !== undefined
    ? ['-q', String(options.quality), input, output]
    : [input, output];

  try {
    await CLIExecutor.execute('heif-convert', args);
  } catch (error) {
    throw wrap(input, 'heif-convert', error);
  }
  return outputSize(output);
}
