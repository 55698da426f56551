#!/usr/bin/env node
/**
 * Configuration loading tests
 * MEDIA_CONFIG_PATH points the loader at temp files; the env is restored afterwards.
 */

import { test, before, after, beforeEach } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { z } from 'zod';
import { BitrateSchema, ConfigManager, MediaConfigSchema } from '../cli/lib/config';
import { UsageError, parseOption } from '../cli/utils/args';

let tmpDir: string;
const savedPath = process.env.MEDIA_CONFIG_PATH;

async function useConfig(name: string, data: unknown): Promise<void> {
  const file = path.join(tmpDir, name);
  await fs.writeJson(file, data);
  process.env.MEDIA_CONFIG_PATH = file;
}

before(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'config-test-'));
});

beforeEach(() => {
  ConfigManager.clearCache();
});

after(async () => {
  if (savedPath === undefined) {
    delete process.env.MEDIA_CONFIG_PATH;
  } else {
    process.env.MEDIA_CONFIG_PATH = savedPath;
  }
  delete process.env.TEST_MEDIA_OUT;
  ConfigManager.clearCache();
  await fs.remove(tmpDir);
});

test('loadMediaConfig() falls back to defaults when the file is missing', async () => {
  process.env.MEDIA_CONFIG_PATH = path.join(tmpDir, 'absent.json');
  const config = await ConfigManager.loadMediaConfig();

  assert.strictEqual(config.compressImages.quality, 82);
  assert.strictEqual(config.compressImages.maxWidth, 1920);
  assert.strictEqual(config.webp.pattern, '*.jpg');
  assert.strictEqual(config.raw.quality, 90);
  assert.strictEqual(config.heic.quality, undefined);
  assert.deepStrictEqual(config.cropVideo.renditions, {
    mobile: { width: 500, height: 700 },
    tablet: { width: 800, height: 700 },
  });
  assert.strictEqual(config.cropVideo.thumbnail.rendition, 'mobile');
  assert.strictEqual(config.compressVideo.presets.web.faststart, true);
  assert.strictEqual(config.compressVideo.presets.fast.faststart, false);
});

test('loadMediaConfig() merges a partial file over the defaults', async () => {
  await useConfig('partial.json', { webp: { quality: 70 } });
  const config = await ConfigManager.loadMediaConfig();

  assert.strictEqual(config.webp.quality, 70);
  assert.strictEqual(config.webp.outputDir, 'webp');
  assert.strictEqual(config.convertVideo.preset, 'medium');
});

test('loadMediaConfig() reports every invalid field', async () => {
  await useConfig('invalid.json', { compressImages: { quality: 500 }, convertVideo: { preset: 'turbo' } });

  await assert.rejects(ConfigManager.loadMediaConfig(), (err: unknown) => {
    assert.ok(err instanceof Error);
    assert.match(err.message, /^Configuration validation failed for media\.config:/);
    assert.match(err.message, /\n {2}- compressImages\.quality: /);
    assert.match(err.message, /\n {2}- convertVideo\.preset: /);
    return true;
  });
});

test('loadMediaConfig() substitutes environment variables', async () => {
  process.env.TEST_MEDIA_OUT = '/srv/out';
  await useConfig('env.json', { cropVideo: { outputDir: '${TEST_MEDIA_OUT}/renditions' } });

  const config = await ConfigManager.loadMediaConfig();
  assert.strictEqual(config.cropVideo.outputDir, '/srv/out/renditions');
});

test('loadMediaConfig() fails on an undefined environment variable', async () => {
  await useConfig('env-missing.json', { cropVideo: { outputDir: '${TEST_MEDIA_UNSET_VAR}' } });
  await assert.rejects(ConfigManager.loadMediaConfig(), /Environment variable TEST_MEDIA_UNSET_VAR is not defined/);
});

test('loadMediaConfig() caches until cleared', async () => {
  await useConfig('cached.json', { webp: { quality: 60 } });
  assert.strictEqual((await ConfigManager.loadMediaConfig()).webp.quality, 60);

  await fs.writeJson(path.join(tmpDir, 'cached.json'), { webp: { quality: 61 } });
  assert.strictEqual((await ConfigManager.loadMediaConfig()).webp.quality, 60);

  ConfigManager.clearCache();
  assert.strictEqual((await ConfigManager.loadMediaConfig()).webp.quality, 61);
});

test('load() requires the file unless it is optional', async () => {
  await assert.rejects(
    ConfigManager.load('no-such-config', z.object({})),
    /Configuration file not found: .*no-such-config\.json$/
  );
});

test('the shipped media config is valid', async () => {
  const file = path.join(__dirname, '..', 'config', 'media.config.json');
  const result = MediaConfigSchema.safeParse(await fs.readJson(file));

  assert.ok(result.success);
  assert.deepStrictEqual(result.data.heic.extensions, ['heic', 'heif']);
  assert.strictEqual(result.data.compressVideo.presets.mobile.profile, 'baseline');
});

test('BitrateSchema accepts ffmpeg bitrates only', () => {
  assert.strictEqual(parseOption(BitrateSchema, '192k', '128k'), '192k');
  assert.strictEqual(parseOption(BitrateSchema, '2M', '128k'), '2M');
  assert.strictEqual(parseOption(BitrateSchema, undefined, '128k'), '128k');
  assert.throws(() => parseOption(BitrateSchema, 'loud', '128k'), (err: unknown) => {
    return err instanceof UsageError && err.message === 'Expected a bitrate such as 128k or 2M';
  });
});
