import { z } from 'zod';

export class UsageError extends Error {
  readonly code = 'USAGE';

  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const QualitySchema = z.coerce
  .number({ invalid_type_error: 'Quality must be a number' })
  .int('Quality must be between 1 and 100')
  .min(1, 'Quality must be between 1 and 100')
  .max(100, 'Quality must be between 1 and 100');

export const CrfSchema = z.coerce
  .number({ invalid_type_error: 'Quality (CRF) must be a number' })
  .int('Quality (CRF) must be between 0 and 51')
  .min(0, 'Quality (CRF) must be between 0 and 51')
  .max(51, 'Quality (CRF) must be between 0 and 51');

export const WidthSchema = z.coerce
  .number({ invalid_type_error: 'Width must be a positive number' })
  .int('Width must be a positive number')
  .positive('Width must be a positive number');

export const PositiveIntSchema = z.coerce
  .number({ invalid_type_error: 'Expected a positive number' })
  .int('Expected a positive number')
  .positive('Expected a positive number');

/**
 * Flags and positionals pulled out of `process.argv.slice(2)`.
 * Options that take a value are declared up front; anything else
 * starting with `-` is a boolean flag.
 */
export class ParsedArgs {
  private readonly values = new Map<string, string>();
  private readonly flags = new Set<string>();
  private readonly takesValue: Set<string>;
  readonly positionals: string[] = [];

  constructor(args: string[], valueOptions: string[] = []) {
    const takesValue = new Set(valueOptions);
    this.takesValue = takesValue;

    for (let i = 0; i < args.length; i++) {
      const arg = args[i];

      if (arg === '--') {
        this.positionals.push(...args.slice(i + 1));
        break;
      }

      if (arg.startsWith('--') && arg.includes('=')) {
        const eq = arg.indexOf('=');
        this.values.set(arg.slice(0, eq), arg.slice(eq + 1));
        continue;
      }

      if (takesValue.has(arg)) {
        const next = args[i + 1];
        if (next === undefined) {
          throw new UsageError(`Option ${arg} requires a value`);
        }
        this.values.set(arg, next);
        i++;
        continue;
      }

      if (arg.startsWith('-') && arg.length > 1) {
        this.flags.add(arg);
        continue;
      }

      this.positionals.push(arg);
    }
  }

  /**
   * Value of the first alias present (e.g. `get('-q', '--quality')`)
   */
  get(...aliases: string[]): string | undefined {
    for (const alias of aliases) {
      const value = this.values.get(alias);
      if (value !== undefined) return value;
    }
    return undefined;
  }

  has(...aliases: string[]): boolean {
    return aliases.some((alias) => this.flags.has(alias) || this.values.has(alias));
  }

  /**
   * Flags and `--name=value` keys that were neither declared nor in `known`
   */
  unknownFlags(known: string[]): string[] {
    const unknownFlags = [...this.flags].filter((flag) => !known.includes(flag));
    const unknownValues = [...this.values.keys()].filter((key) => !this.takesValue.has(key) && !known.includes(key));
    return [...unknownFlags, ...unknownValues];
  }
}

/**
 * Validate an option value, mapping schema failures to a UsageError
 */
export function parseOption<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: string | undefined,
  fallback: T
): T {
  if (value === undefined) return fallback;
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new UsageError(result.error.issues[0]?.message ?? `Invalid value: ${value}`);
  }
  return result.data;
}
