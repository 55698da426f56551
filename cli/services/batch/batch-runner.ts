/**
 * Batch runner: finds input files, runs a per-file job over them with
 * bounded concurrency, and totals the before/after sizes.
 */

import fs from 'fs-extra';
import pLimit from 'p-limit';
import path from 'path';
import { logger } from '../../utils/logger';
import { formatClock } from '../media/progress';
import { humanSize, savingsPercent } from '../../utils/size-stats';

export class InputNotFoundError extends Error {
  readonly code = 'INPUT_NOT_FOUND';

  constructor(public readonly input: string) {
    super(`Input not found: ${input}`);
    this.name = 'InputNotFoundError';
  }
}

export interface DiscoverOptions {
  /** A single file or a directory */
  input?: string;
  /** Basename wildcard (`*`, `?`), optionally prefixed with a directory */
  pattern?: string;
  /** Extensions accepted when scanning a directory, without the dot */
  extensions?: string[];
  cwd?: string;
}

export interface JobResult {
  output: string;
  outputBytes: number;
}

export type FileOutcome =
  | { status: 'ok'; file: string; output: string; originalBytes: number; outputBytes: number }
  | { status: 'failed'; file: string; error: string };

export interface BatchSummary {
  processed: number;
  failed: number;
  totalOriginalBytes: number;
  totalOutputBytes: number;
  elapsedMs: number;
  outcomes: FileOutcome[];
}

export interface RunBatchOptions {
  concurrency?: number;
  /** Called after each file, in completion order */
  onOutcome?: (outcome: FileOutcome) => void;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.+^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compile a basename wildcard to a RegExp. `*` matches any run of
 * characters, `?` exactly one.
 */
export function wildcardToRegExp(pattern: string, caseInsensitive = false): RegExp {
  const source = pattern
    .split('')
    .map((ch) => {
      if (ch === '*') return '.*';
      if (ch === '?') return '.';
      return escapeRegExp(ch);
    })
    .join('');
  return new RegExp(`^${source}$`, caseInsensitive ? 'i' : '');
}

async function listFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries.filter((entry) => entry.isFile()).map((entry) => path.join(dir, entry.name));
}

function hasExtension(file: string, extensions: string[]): boolean {
  const ext = path.extname(file).slice(1).toLowerCase();
  return extensions.some((allowed) => allowed.toLowerCase() === ext);
}

/**
 * Resolve the files a command should process, sorted by path
 */
export async function discoverInputs(options: DiscoverOptions): Promise<string[]> {
  const cwd = options.cwd ?? process.cwd();

  if (options.input) {
    const target = path.resolve(cwd, options.input);
    if (!(await fs.pathExists(target))) {
      throw new InputNotFoundError(options.input);
    }

    const stat = await fs.stat(target);
    if (stat.isFile()) return [target];

    const files = await listFiles(target);
    const extensions = options.extensions;
    return (extensions ? files.filter((f) => hasExtension(f, extensions)) : files).sort();
  }

  if (options.pattern) {
    const dir = path.resolve(cwd, path.dirname(options.pattern));
    if (!(await fs.pathExists(dir))) {
      throw new InputNotFoundError(path.dirname(options.pattern));
    }
    const matcher = wildcardToRegExp(path.basename(options.pattern));
    const files = await listFiles(dir);
    return files.filter((f) => matcher.test(path.basename(f))).sort();
  }

  return [];
}

/**
 * Run `job` for every file. A failing file is recorded and counted;
 * the remaining files still run.
 */
export async function runBatch(
  files: string[],
  job: (file: string) => Promise<JobResult>,
  options: RunBatchOptions = {}
): Promise<BatchSummary> {
  const startTime = Date.now();
  const limit = pLimit(Math.max(1, options.concurrency ?? 1));

  const outcomes = await Promise.all(
    files.map((file) =>
      limit(async (): Promise<FileOutcome> => {
        let outcome: FileOutcome;
        try {
          const stat = await fs.stat(file);
          const result = await job(file);
          outcome = {
            status: 'ok',
            file,
            output: result.output,
            originalBytes: stat.size,
            outputBytes: result.outputBytes,
          };
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          logger.warn(`Failed to process ${file}: ${message}`);
          outcome = { status: 'failed', file, error: message };
        }
        options.onOutcome?.(outcome);
        return outcome;
      })
    )
  );

  let processed = 0;
  let failed = 0;
  let totalOriginalBytes = 0;
  let totalOutputBytes = 0;

  for (const outcome of outcomes) {
    if (outcome.status === 'ok') {
      processed++;
      totalOriginalBytes += outcome.originalBytes;
      totalOutputBytes += outcome.outputBytes;
    } else {
      failed++;
    }
  }

  return {
    processed,
    failed,
    totalOriginalBytes,
    totalOutputBytes,
    elapsedMs: Date.now() - startTime,
    outcomes,
  };
}

export interface SummaryLabels {
  /** e.g. "Conversion complete!" */
  title: string;
  /** e.g. "Total converted size" */
  outputTotal: string;
  showElapsed?: boolean;
}

/**
 * Closing report lines for a batch
 */
export function formatSummary(summary: BatchSummary, labels: SummaryLabels): string[] {
  const lines = [labels.title];
  if (labels.showElapsed) {
    lines.push(`Time taken: ${formatClock(summary.elapsedMs / 1000)}`);
  }
  lines.push(`Files processed: ${summary.processed}`);
  if (summary.failed > 0) {
    lines.push(`Files failed: ${summary.failed}`);
  }
  lines.push(
    `Total original size: ${humanSize(summary.totalOriginalBytes)}`,
    `${labels.outputTotal}: ${humanSize(summary.totalOutputBytes)}`,
    `Total space saved: ${savingsPercent(summary.totalOriginalBytes, summary.totalOutputBytes)}%`
  );
  return lines;
}
