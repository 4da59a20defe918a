/**
 * CLI Argument Parser
 *
 * Parses command line arguments into structured ParsedArgs
 */

import { ParsedArgs, ParseResult, DEFAULT_ARGS } from './types';

type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

/**
 * Parse a positive integer from a string
 */
function parsePositiveInt(value: string, name: string): Parsed<number> {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    return { ok: false, error: `${name} must be a positive integer` };
  }
  return { ok: true, value: parsed };
}

/**
 * Parse a comma-separated list of 1-based step numbers into 0-based ordinals
 */
function parseStepList(value: string, name: string): Parsed<number[]> {
  const ordinals: number[] = [];
  for (const part of value.split(',')) {
    const step = parsePositiveInt(part.trim(), name);
    if (!step.ok) {
      return { ok: false, error: `${name} must be a comma-separated list of step numbers` };
    }
    ordinals.push(step.value - 1);
  }
  return { ok: true, value: [...new Set(ordinals)] };
}

/**
 * Parse a comma-separated list of names
 */
function parseNameList(value: string, name: string): Parsed<string[]> {
  const names = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  if (names.length === 0) {
    return { ok: false, error: `${name} requires at least one name` };
  }
  return { ok: true, value: names };
}

/**
 * Get the value for an argument, handling both --arg value and --arg=value formats
 */
function getArgValue(
  args: string[],
  index: number,
  argName: string
): { ok: true; value: string; skip: number } | { ok: false; error: string } {
  const arg = args[index];

  const equals = arg.indexOf('=');
  if (equals !== -1) {
    const value = arg.slice(equals + 1);
    if (!value) {
      return { ok: false, error: `${argName}= requires a value` };
    }
    return { ok: true, value, skip: 0 };
  }

  const nextArg = args[index + 1];
  if (nextArg === undefined || nextArg.startsWith('--')) {
    return { ok: false, error: `${argName} requires a value` };
  }
  return { ok: true, value: nextArg, skip: 1 };
}

function failure(error: string): ParseResult {
  return { success: false, error: `Error: ${error}` };
}

/**
 * Parse command line arguments
 */
export function parseArgs(argv: string[]): ParseResult {
  const args = argv.slice(2); // Remove node and script path
  const result: ParsedArgs = { ...DEFAULT_ARGS };
  const words: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const argBase = arg.split('=')[0];

    switch (argBase) {
      case '--help':
      case '-h': {
        result.help = true;
        break;
      }

      case '--version':
      case '-v': {
        result.version = true;
        break;
      }

      case '--offline': {
        result.offline = true;
        break;
      }

      case '--fail-steps': {
        const raw = getArgValue(args, i, argBase);
        if (!raw.ok) return failure(raw.error);
        const parsed = parseStepList(raw.value, argBase);
        if (!parsed.ok) return failure(parsed.error);
        result.failSteps = parsed.value;
        i += raw.skip;
        break;
      }

      case '--fail-tools': {
        const raw = getArgValue(args, i, argBase);
        if (!raw.ok) return failure(raw.error);
        const parsed = parseNameList(raw.value, argBase);
        if (!parsed.ok) return failure(parsed.error);
        result.failTools = parsed.value;
        i += raw.skip;
        break;
      }

      case '--timeout-ms':
      case '--poll-interval-ms': {
        const raw = getArgValue(args, i, argBase);
        if (!raw.ok) return failure(raw.error);
        const parsed = parsePositiveInt(raw.value, argBase);
        if (!parsed.ok) return failure(parsed.error);
        if (argBase === '--timeout-ms') {
          result.timeoutMs = parsed.value;
        } else {
          result.pollIntervalMs = parsed.value;
        }
        i += raw.skip;
        break;
      }

      case '--model': {
        const raw = getArgValue(args, i, argBase);
        if (!raw.ok) return failure(raw.error);
        result.model = raw.value;
        i += raw.skip;
        break;
      }

      case '--data-dir': {
        const raw = getArgValue(args, i, argBase);
        if (!raw.ok) return failure(raw.error);
        result.dataDirectory = raw.value;
        i += raw.skip;
        break;
      }

      case '--no-interactive': {
        result.noInteractive = true;
        break;
      }

      case '--verbose': {
        result.verbose = true;
        break;
      }

      case '--debug': {
        result.debug = true;
        break;
      }

      case '--json': {
        result.jsonOutput = true;
        break;
      }

      default: {
        if (arg.startsWith('--')) {
          return failure(`Unknown option: ${argBase}`);
        }
        // Part of the recipe name
        words.push(arg);
      }
    }
  }

  if (result.failSteps !== null && result.failTools !== null) {
    return failure('--fail-steps and --fail-tools cannot be used together');
  }

  result.recipe = words.join(' ').trim();
  return { success: true, args: result };
}
