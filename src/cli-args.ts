// Shared argv handling for the CLIs: node's parseArgs in strict mode, with its
// errors mapped onto UsageError messages.

import { ParseArgsConfig, parseArgs } from 'util';
import { UsageError } from './errors';

export type CliOptions = NonNullable<ParseArgsConfig['options']>;
export type CliValues = Record<string, string | boolean | undefined>;

function errorCode(e: unknown): string | undefined {
  return e instanceof Error && 'code' in e && typeof e.code === 'string' ? e.code : undefined;
}

function quoted(message: string): string | undefined {
  return /'([^']+)'/.exec(message)?.[1];
}

export function toUsageError(e: unknown): UsageError {
  const message = e instanceof Error ? e.message : String(e);
  switch (errorCode(e)) {
    case 'ERR_PARSE_ARGS_UNKNOWN_OPTION':
    case 'ERR_PARSE_ARGS_UNEXPECTED_POSITIONAL':
      return new UsageError(`Unknown option: ${quoted(message) || message}`);
    case 'ERR_PARSE_ARGS_INVALID_OPTION_VALUE':
      return new UsageError(`Missing value for option ${quoted(message) || ''}`.trim());
    default:
      return new UsageError(message);
  }
}

export function parseCliArgs(argv: string[], options: CliOptions): CliValues {
  try {
    const { values } = parseArgs({ args: argv, options, strict: true, allowPositionals: false });
    const out: CliValues = {};
    for (const [key, value] of Object.entries(values)) {
      out[key] = Array.isArray(value) ? value[value.length - 1] : value;
    }
    return out;
  } catch (e: unknown) {
    throw toUsageError(e);
  }
}

export function stringArg(values: CliValues, key: string): string | undefined {
  const v = values[key];
  return typeof v === 'string' && v.length ? v : undefined;
}

export function flagArg(values: CliValues, key: string): boolean {
  return values[key] === true;
}
