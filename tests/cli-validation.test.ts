#!/usr/bin/env node
/**
 * External tool checks and execution errors
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { CLIExecutionError, CLIExecutor } from '../cli/utils/cli-executor';
import { CLIValidator, MissingToolError } from '../cli/utils/cli-validation';

const MISSING_TOOL = 'media-squeeze-no-such-tool';

test('MissingToolError names one tool with its install hint', () => {
  const error = new MissingToolError(['dcraw']);
  assert.strictEqual(error.code, 'MISSING_TOOL');
  assert.strictEqual(
    error.message,
    'Required tool is not installed:\n  - dcraw (install: apt install dcraw | dnf install dcraw | pacman -S dcraw)'
  );
});

test('MissingToolError prefers configured hints and lists every tool', () => {
  const error = new MissingToolError(['ffmpeg', 'exotic'], { ffmpeg: 'brew install ffmpeg' });
  assert.strictEqual(
    error.message,
    'Required tools are not installed:\n  - ffmpeg (install: brew install ffmpeg)\n  - exotic'
  );
  assert.deepStrictEqual(error.tools, ['ffmpeg', 'exotic']);
});

test('CLIValidator.requireTools() rejects when a tool is missing', async () => {
  await assert.rejects(
    CLIValidator.requireTools([MISSING_TOOL]),
    (err: unknown) => err instanceof MissingToolError && err.tools[0] === MISSING_TOOL
  );
});

test('CLIValidator.validateTools() reports the missing tools', async () => {
  const summary = await CLIValidator.validateTools([MISSING_TOOL]);
  assert.strictEqual(summary.allInstalled, false);
  assert.deepStrictEqual(summary.missing, [MISSING_TOOL]);
  assert.strictEqual(summary.results[0].error, `CLI tool '${MISSING_TOOL}' is not installed`);
});

test('CLIExecutor.execute() maps a missing binary to exit code 127', async () => {
  await assert.rejects(CLIExecutor.execute(MISSING_TOOL, ['--version']), (err: unknown) => {
    return err instanceof CLIExecutionError && err.exitCode === 127 && err.message === `Command not found: ${MISSING_TOOL}`;
  });
});

test('CLIExecutor.execute() returns trimmed output of a successful command', async () => {
  const result = await CLIExecutor.execute(process.execPath, ['-e', 'console.log("  ok  ")']);
  assert.strictEqual(result.stdout, 'ok');
  assert.strictEqual(result.exitCode, 0);
});

test('CLIExecutor.execute() reports the exit code and stderr of a failing command', async () => {
  await assert.rejects(
    CLIExecutor.execute(process.execPath, ['-e', 'console.error("bad frame"); process.exit(3)']),
    (err: unknown) => err instanceof CLIExecutionError && err.exitCode === 3 && err.stderr === 'bad frame\n'
  );
});
