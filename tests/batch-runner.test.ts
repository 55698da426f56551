#!/usr/bin/env node
/**
 * Batch runner tests
 * Input discovery, per-file failure handling and summaries, using temp directories.
 */

import { test, before, after } from 'node:test';
import assert from 'node:assert/strict';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import {
  BatchSummary,
  InputNotFoundError,
  discoverInputs,
  formatSummary,
  runBatch,
  wildcardToRegExp,
} from '../cli/services/batch/batch-runner';

let tmpDir: string;

before(async () => {
  tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'batch-runner-test-'));
  await fs.writeFile(path.join(tmpDir, 'b.jpg'), 'bb');
  await fs.writeFile(path.join(tmpDir, 'a.jpg'), 'a');
  await fs.writeFile(path.join(tmpDir, 'cover-1.jpg'), 'cover');
  await fs.writeFile(path.join(tmpDir, 'shot.CR2'), 'raw');
  await fs.writeFile(path.join(tmpDir, 'notes.txt'), 'text');
  await fs.ensureDir(path.join(tmpDir, 'nested.jpg'));
});

after(async () => {
  await fs.remove(tmpDir);
});

test('wildcardToRegExp() handles * and ? and escapes the rest', () => {
  assert.ok(wildcardToRegExp('*.jpg').test('photo.jpg'));
  assert.ok(!wildcardToRegExp('*.jpg').test('photo.jpeg'));
  assert.ok(!wildcardToRegExp('*.jpg').test('photoXjpg'));
  assert.ok(wildcardToRegExp('img-??.png').test('img-01.png'));
  assert.ok(!wildcardToRegExp('img-??.png').test('img-1.png'));
  assert.ok(!wildcardToRegExp('*.jpg').test('PHOTO.JPG'));
  assert.ok(wildcardToRegExp('*.jpg', true).test('PHOTO.JPG'));
});

test('discoverInputs() matches a pattern against file names, sorted', async () => {
  const files = await discoverInputs({ pattern: path.join(tmpDir, '*.jpg') });
  assert.deepStrictEqual(files, ['a.jpg', 'b.jpg', 'cover-1.jpg'].map((f) => path.join(tmpDir, f)));

  const covers = await discoverInputs({ pattern: 'cover-*.jpg', cwd: tmpDir });
  assert.deepStrictEqual(covers, [path.join(tmpDir, 'cover-1.jpg')]);
});

test('discoverInputs() filters a directory by extension, ignoring case', async () => {
  const files = await discoverInputs({ input: tmpDir, extensions: ['cr2'] });
  assert.deepStrictEqual(files, [path.join(tmpDir, 'shot.CR2')]);
});

test('discoverInputs() returns a single file as-is', async () => {
  const files = await discoverInputs({ input: 'notes.txt', cwd: tmpDir, extensions: ['cr2'] });
  assert.deepStrictEqual(files, [path.join(tmpDir, 'notes.txt')]);
});

test('discoverInputs() rejects a missing input', async () => {
  await assert.rejects(
    discoverInputs({ input: path.join(tmpDir, 'missing.CR2') }),
    (err: unknown) => err instanceof InputNotFoundError && err.code === 'INPUT_NOT_FOUND'
  );
});

test('discoverInputs() returns nothing without input or pattern', async () => {
  assert.deepStrictEqual(await discoverInputs({}), []);
});

test('runBatch() totals sizes and keeps going after a failure', async () => {
  const files = ['a.jpg', 'b.jpg', 'cover-1.jpg'].map((f) => path.join(tmpDir, f));
  const seen: string[] = [];

  const summary = await runBatch(
    files,
    async (file) => {
      if (file.endsWith('b.jpg')) {
        throw new Error('corrupt input');
      }
      return { output: `${file}.out`, outputBytes: 1 };
    },
    { onOutcome: (outcome) => seen.push(outcome.status) }
  );

  assert.strictEqual(summary.processed, 2);
  assert.strictEqual(summary.failed, 1);
  // a.jpg is 1 byte, cover-1.jpg is 5 bytes
  assert.strictEqual(summary.totalOriginalBytes, 6);
  assert.strictEqual(summary.totalOutputBytes, 2);
  assert.deepStrictEqual(summary.outcomes.map((o) => o.status), ['ok', 'failed', 'ok']);
  assert.deepStrictEqual(summary.outcomes[1], { status: 'failed', file: files[1], error: 'corrupt input' });
  assert.strictEqual(seen.length, 3);
});

test('runBatch() records a vanished file as failed', async () => {
  const summary = await runBatch([path.join(tmpDir, 'gone.jpg')], async (file) => ({ output: file, outputBytes: 0 }));
  assert.strictEqual(summary.failed, 1);
  assert.strictEqual(summary.processed, 0);
});

test('runBatch() never exceeds the concurrency limit', async () => {
  const files = ['a.jpg', 'b.jpg', 'cover-1.jpg', 'notes.txt', 'shot.CR2'].map((f) => path.join(tmpDir, f));
  let active = 0;
  let peak = 0;

  const summary = await runBatch(
    files,
    async (file) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 10));
      active--;
      return { output: file, outputBytes: 1 };
    },
    { concurrency: 2 }
  );

  assert.strictEqual(summary.processed, 5);
  assert.strictEqual(peak, 2);
  assert.deepStrictEqual(summary.outcomes.map((o) => o.file), files);
});

test('formatSummary() lists counts and totals', () => {
  const summary: BatchSummary = {
    processed: 2,
    failed: 1,
    totalOriginalBytes: 4096,
    totalOutputBytes: 1024,
    elapsedMs: 3723000,
    outcomes: [],
  };

  assert.deepStrictEqual(
    formatSummary(summary, { title: 'Conversion complete!', outputTotal: 'Total converted size', showElapsed: true }),
    [
      'Conversion complete!',
      'Time taken: 01:02:03',
      'Files processed: 2',
      'Files failed: 1',
      'Total original size: 4KB',
      'Total converted size: 1KB',
      'Total space saved: 75%',
    ]
  );
});

test('formatSummary() omits the failure line and elapsed time when not needed', () => {
  const summary: BatchSummary = {
    processed: 0,
    failed: 0,
    totalOriginalBytes: 0,
    totalOutputBytes: 0,
    elapsedMs: 0,
    outcomes: [],
  };

  assert.deepStrictEqual(formatSummary(summary, { title: 'Done', outputTotal: 'Total WebP size' }), [
    'Done',
    'Files processed: 0',
    'Total original size: 0B',
    'Total WebP size: 0B',
    'Total space saved: 0%',
  ]);
});
