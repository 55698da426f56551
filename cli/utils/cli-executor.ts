import { execFile, spawn } from 'child_process';
import fs from 'fs-extra';
import { pipeline } from 'stream/promises';
import { promisify } from 'util';

const execFileAsync = promisify(execFile);

export interface CLIExecutionOptions {
  timeout?: number; // milliseconds
  cwd?: string;
  env?: Record<string, string>;
  maxBuffer?: number; // bytes
}

export interface CLIExecutionResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  executionTime: number; // milliseconds
}

export class CLIExecutionError extends Error {
  readonly code = 'CLI_EXECUTION_FAILED';

  constructor(
    message: string,
    public readonly command: string,
    public readonly stdout: string,
    public readonly stderr: string,
    public readonly exitCode: number
  ) {
    super(message);
    this.name = 'CLIExecutionError';
  }
}

interface ExecFailure {
  code?: number | string;
  killed?: boolean;
  signal?: string | null;
  stdout?: string;
  stderr?: string;
  message: string;
}

function asExecFailure(error: unknown): ExecFailure {
  if (error instanceof Error) {
    const e: Error & Partial<ExecFailure> = error;
    return {
      code: e.code,
      killed: e.killed,
      signal: e.signal,
      stdout: typeof e.stdout === 'string' ? e.stdout : '',
      stderr: typeof e.stderr === 'string' ? e.stderr : '',
      message: e.message,
    };
  }
  return { message: String(error) };
}

/**
 * Runs external binaries by argument vector (no shell) with timeout and error mapping
 */
export class CLIExecutor {
  /**
   * Execute a binary and return its trimmed output
   * @throws CLIExecutionError if the command fails
   */
  static async execute(
    tool: string,
    args: string[] = [],
    options: CLIExecutionOptions = {}
  ): Promise<CLIExecutionResult> {
    const startTime = Date.now();
    const command = [tool, ...args].join(' ');

    const {
      timeout = 10 * 60 * 1000, // media conversions run long
      cwd = process.cwd(),
      env = {},
      maxBuffer = 10 * 1024 * 1024,
    } = options;

    try {
      const { stdout, stderr } = await execFileAsync(tool, args, {
        timeout,
        cwd,
        env: { ...process.env, ...env },
        maxBuffer,
      });

      return {
        stdout: stdout.trim(),
        stderr: stderr.trim(),
        exitCode: 0,
        executionTime: Date.now() - startTime,
      };
    } catch (error) {
      const failure = asExecFailure(error);

      if (failure.killed && failure.signal === 'SIGTERM') {
        throw new CLIExecutionError(
          `Command timed out after ${timeout}ms`,
          command,
          failure.stdout ?? '',
          failure.stderr ?? '',
          -1
        );
      }

      if (failure.code === 'ENOENT') {
        throw new CLIExecutionError(`Command not found: ${tool}`, command, '', '', 127);
      }

      const exitCode = typeof failure.code === 'number' ? failure.code : 1;
      throw new CLIExecutionError(
        `Command failed with exit code ${exitCode}: ${failure.stderr || failure.message}`,
        command,
        failure.stdout ?? '',
        failure.stderr ?? '',
        exitCode
      );
    }
  }

  /**
   * Run a binary and write its stdout to `outputPath` (for tools that emit image data on stdout)
   * @throws CLIExecutionError if the command fails
   */
  static async executeToFile(
    tool: string,
    args: string[],
    outputPath: string,
    options: Pick<CLIExecutionOptions, 'cwd' | 'env'> = {}
  ): Promise<void> {
    const command = [tool, ...args].join(' ');

    const proc = spawn(tool, args, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stderr = '';
    proc.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    const exited = new Promise<void>((resolve, reject) => {
      proc.on('error', (err: NodeJS.ErrnoException) => {
        const notFound = err.code === 'ENOENT';
        reject(new CLIExecutionError(
          notFound ? `Command not found: ${tool}` : err.message,
          command,
          '',
          stderr,
          notFound ? 127 : 1
        ));
      });
      proc.on('close', (code) => {
        if (code === 0) return resolve();
        reject(new CLIExecutionError(
          `Command failed with exit code ${code}: ${stderr.trim()}`,
          command,
          '',
          stderr.trim(),
          code ?? 1
        ));
      });
    });

    await Promise.all([pipeline(proc.stdout, fs.createWriteStream(outputPath)), exited]);
  }

  /**
   * Check if a CLI tool is installed and accessible
   */
  static async isInstalled(toolName: string): Promise<boolean> {
    try {
      await this.execute('which', [toolName], { timeout: 5000 });
      return true;
    } catch {
      return false;
    }
  }
}
