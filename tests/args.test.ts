#!/usr/bin/env node
/**
 * Argument parsing tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  CrfSchema,
  ParsedArgs,
  PositiveIntSchema,
  QualitySchema,
  UsageError,
  WidthSchema,
  parseOption,
} from '../cli/utils/args';

test('ParsedArgs separates values, flags and positionals', () => {
  const args = new ParsedArgs(['-q', '85', '--verbose', '--out=dir', 'photo.jpg', '-'], ['-q']);

  assert.strictEqual(args.get('-q'), '85');
  assert.strictEqual(args.get('--quality', '-q'), '85');
  assert.strictEqual(args.get('--out'), 'dir');
  assert.strictEqual(args.get('-w'), undefined);
  assert.ok(args.has('--verbose'));
  assert.ok(!args.has('-w'));
  assert.deepStrictEqual(args.positionals, ['photo.jpg', '-']);
});

test('ParsedArgs treats everything after -- as positional', () => {
  const args = new ParsedArgs(['-o', 'out', '--', '-odd-name.mov'], ['-o']);
  assert.strictEqual(args.get('-o'), 'out');
  assert.deepStrictEqual(args.positionals, ['-odd-name.mov']);
});

test('ParsedArgs requires a value for declared options', () => {
  assert.throws(() => new ParsedArgs(['in.jpg', '-q'], ['-q']), (err: unknown) => {
    return err instanceof UsageError && err.message === 'Option -q requires a value';
  });
});

test('unknownFlags() lists flags outside the known set', () => {
  const args = new ParsedArgs(['-w', '--fill', '1280x720', '-x'], ['--fill']);
  assert.deepStrictEqual(args.unknownFlags(['-w']), ['-x']);
});

test('unknownFlags() reports misspelt --name=value options', () => {
  const args = new ParsedArgs(['--renditon=mobile=1x1', '--crf=20'], ['--crf']);
  assert.strictEqual(args.get('--crf'), '20');
  assert.deepStrictEqual(args.unknownFlags([]), ['--renditon']);
});

test('parseOption() returns the fallback when the option is absent', () => {
  assert.strictEqual(parseOption(QualitySchema, undefined, 82), 82);
  assert.strictEqual(parseOption(QualitySchema.optional(), undefined, undefined), undefined);
});

test('parseOption() coerces numeric strings', () => {
  assert.strictEqual(parseOption(QualitySchema, '85', 82), 85);
  assert.strictEqual(parseOption(CrfSchema, '0', 23), 0);
  assert.strictEqual(parseOption(WidthSchema, '1600', 1920), 1600);
  assert.strictEqual(parseOption(PositiveIntSchema, '4', 1), 4);
});

test('parseOption() maps range errors to usage errors', () => {
  const quality = (value: string) => () => parseOption(QualitySchema, value, 82);
  assert.throws(quality('0'), { name: 'UsageError', message: 'Quality must be between 1 and 100' });
  assert.throws(quality('101'), { name: 'UsageError', message: 'Quality must be between 1 and 100' });
  assert.throws(quality('12.5'), { name: 'UsageError', message: 'Quality must be between 1 and 100' });
  assert.throws(quality('high'), UsageError);

  assert.throws(() => parseOption(CrfSchema, '52', 23), { message: 'Quality (CRF) must be between 0 and 51' });
  assert.throws(() => parseOption(WidthSchema, '-5', 1920), { message: 'Width must be a positive number' });
  assert.throws(() => parseOption(PositiveIntSchema, '0', 1), { message: 'Expected a positive number' });
});
