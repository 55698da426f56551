import * as dotenv from 'dotenv';
import { InvalidDimensionsError } from '../services/media/geometry-planner';
import { logger } from '../utils/logger';
import { ParsedArgs, UsageError } from '../utils/args';

export type CommandMain = (argv: string[]) => Promise<number>;

let envLoaded = false;

/**
 * Load `.env.local`, then `.env` (earlier files win)
 */
export function loadEnv(): void {
  if (envLoaded) return;
  dotenv.config({ path: '.env.local' });
  dotenv.config();
  envLoaded = true;
}

/**
 * Prints a `[TAG]`-prefixed line to stdout
 */
export function say(tag: string, message = ''): void {
  console.log(message ? `[${tag}] ${message}` : '');
}

export function printUsage(usage: string[]): void {
  for (const line of usage) {
    console.log(line);
  }
}

export interface CommandSpec {
  tag: string;
  usage: string[];
  /** Options that consume the following argument */
  valueOptions?: string[];
  /** Boolean flags the command understands besides --help and --verbose */
  flags?: string[];
  /** Defaults to `--help` and `-h` */
  helpFlags?: string[];
}

/**
 * Shared wrapper for command bodies: parses argv, handles `--help` and
 * `--verbose`, and turns thrown errors into exit code 1.
 */
export async function runCommand(
  spec: CommandSpec,
  argv: string[],
  body: (args: ParsedArgs) => Promise<number>
): Promise<number> {
  const { tag, usage, helpFlags = ['--help', '-h'] } = spec;

  try {
    const args = new ParsedArgs(argv, spec.valueOptions);
    if (args.has(...helpFlags)) {
      printUsage(usage);
      return 0;
    }
    if (args.has('--verbose')) {
      logger.setLevel('debug');
    }

    const unknown = args.unknownFlags([...helpFlags, '--verbose', ...(spec.flags ?? [])]);
    if (unknown.length > 0) {
      throw new UsageError(`Unknown option: ${unknown.join(', ')}`);
    }

    return await body(args);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[${tag}] ✗ Error: ${message}`);
    if (error instanceof UsageError || error instanceof InvalidDimensionsError) {
      printUsage(usage);
    } else if (error instanceof Error && error.stack) {
      logger.debug(error.stack);
    }
    return 1;
  }
}

/**
 * Entry point used by `require.main === module` blocks
 */
export function runMain(main: CommandMain): void {
  loadEnv();
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
