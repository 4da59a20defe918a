/**
 * Cook command
 * Resolves config, starts one run through the registry and polls its
 * snapshots until it ends. SIGINT cancels the run.
 */

import { EventEmitter } from 'events';
import type { ParsedArgs } from '../cli/types';
import { formatEffectiveConfigForDisplay } from '../config/format-effective-config';
import { CliFlags, ConfigEnvironment, resolveConfig } from '../config/resolve-config';
import type { ProgressSnapshot } from '../core/progress-snapshot';
import {
  createKitchen,
  createLoggerForConfig,
  Kitchen,
  KitchenOverrides,
} from '../orchestration/kitchen-factory';
import type { EffectiveConfig } from '../types/effective-config';
import { CatalogLoadError, describeError, InvalidRecipeError, isCancellation } from '../types/errors';
import { createConsoleLogger } from '../logging/console-logger';
import { ExitCode } from '../types/exit-codes';
import type { Prompter } from '../types/prompter';
import { isErr } from '../types/result';
import { createInquirerPrompter } from '../ui/inquirer-prompter';
import { ProgressRenderer } from '../ui/progress-renderer';
import { SpinnerService } from '../ui/spinner-service';

export interface CookDependencies {
  env?: ConfigEnvironment;
  /** Directory searched for .chef/config.json; defaults to process.cwd() */
  cwd?: string;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
  /** Whether stdout is a terminal; decides between ora and plain lines */
  isTTY?: boolean;
  prompter?: Prompter;
  /** Emits SIGINT; defaults to process */
  signals?: EventEmitter;
  kitchen?: KitchenOverrides;
}

/**
 * Map parsed arguments onto config flags
 */
export function argsToCliFlags(args: ParsedArgs): CliFlags {
  return {
    offline: args.offline ? true : undefined,
    failSteps: args.failSteps ?? undefined,
    failTools: args.failTools ?? undefined,
    timeoutMs: args.timeoutMs ?? undefined,
    model: args.model ?? undefined,
    pollIntervalMs: args.pollIntervalMs ?? undefined,
    dataDirectory: args.dataDirectory ?? undefined,
    verbose: args.verbose,
    debug: args.debug,
    jsonOutput: args.jsonOutput,
    noInteractive: args.noInteractive ? true : undefined,
  };
}

/**
 * Exit code for the phase a run ended in
 */
export function exitCodeForSnapshot(snapshot: ProgressSnapshot): ExitCode {
  switch (snapshot.phase) {
    case 'DONE':
      return ExitCode.SUCCESS;
    case 'CANCELLED':
      return ExitCode.CANCELLED;
    default:
      return ExitCode.UNEXPECTED_ERROR;
  }
}

type RecipeAnswer = { recipe: string } | { exitCode: ExitCode; message: string };

async function obtainRecipe(
  args: ParsedArgs,
  config: EffectiveConfig,
  prompter: Prompter
): Promise<RecipeAnswer> {
  if (args.recipe) {
    return { recipe: args.recipe };
  }
  if (!config.interactivity.interactive || !prompter.canPrompt()) {
    return { exitCode: ExitCode.USAGE_ERROR, message: 'No recipe given' };
  }

  const answer = await prompter.ask({
    message: 'What would you like to cook?',
    validate: (value) => value.trim().length > 0 || 'Enter a recipe name',
  });
  if (isErr(answer)) {
    return answer.error.code === 'CANCELLED'
      ? { exitCode: ExitCode.CANCELLED, message: 'Cancelled' }
      : { exitCode: ExitCode.USAGE_ERROR, message: answer.error.message };
  }
  return { recipe: answer.value };
}

/**
 * Poll the run until it ends, rendering each new snapshot
 */
async function followRun(
  runId: string,
  finished: Promise<ProgressSnapshot>,
  kitchen: Kitchen,
  renderer: ProgressRenderer
): Promise<ProgressSnapshot> {
  const { registry, clock, config } = kitchen;
  const polling = new AbortController();
  const stopPolling = (): void => polling.abort();
  void finished.then(stopPolling, stopPolling);

  while (!polling.signal.aborted) {
    const snapshot = registry.snapshot(runId);
    if (snapshot !== undefined) {
      renderer.render(snapshot);
    }
    await clock.delay(config.polling.intervalMs, polling.signal).catch((error: unknown) => {
      if (!isCancellation(error)) {
        throw error;
      }
    });
  }

  const final = await finished;
  renderer.render(final);
  return final;
}

/**
 * Run the cook command and return the process exit code
 */
export async function runCook(args: ParsedArgs, deps: CookDependencies = {}): Promise<ExitCode> {
  const stdout = deps.stdout ?? process.stdout;
  const stderr = deps.stderr ?? process.stderr;
  const signals = deps.signals ?? process;

  // Config warnings need a logger before the config exists
  const startupLogger =
    deps.kitchen?.logger ??
    createConsoleLogger({ minLevel: 'warn', jsonOutput: args.jsonOutput, stream: stderr });
  const config = resolveConfig(
    { ...argsToCliFlags(args), workingDirectory: deps.cwd },
    { env: deps.env, logger: startupLogger }
  );
  const logger = deps.kitchen?.logger ?? createLoggerForConfig(config, stderr);

  if (config.verbosity.verbose || config.verbosity.debug) {
    stderr.write(`${formatEffectiveConfigForDisplay(config)}\n`);
  }

  const prompter = deps.prompter ?? createInquirerPrompter(config.interactivity.interactive);
  const recipe = await obtainRecipe(args, config, prompter);
  if ('exitCode' in recipe) {
    stderr.write(`Error: ${recipe.message}\n`);
    return recipe.exitCode;
  }

  let kitchen: Kitchen;
  try {
    kitchen = createKitchen(config, { ...deps.kitchen, logger });
  } catch (error) {
    if (error instanceof CatalogLoadError) {
      stderr.write(`Error: ${error.message}\n`);
      return ExitCode.CATALOG_ERROR;
    }
    throw error;
  }

  let runId: string;
  try {
    runId = kitchen.registry.start(recipe.recipe);
  } catch (error) {
    if (error instanceof InvalidRecipeError) {
      stderr.write(`Error: ${error.message}\n`);
      return ExitCode.USAGE_ERROR;
    }
    throw error;
  }

  const spinners = new SpinnerService({
    stream: stdout,
    isTTY: deps.isTTY ?? process.stdout.isTTY ?? false,
    quiet: config.verbosity.jsonOutput,
  });
  const renderer = new ProgressRenderer(spinners);

  const onInterrupt = (): void => {
    if (kitchen.registry.cancel(runId, 'Interrupted')) {
      logger.warn('Cancellation requested');
    }
  };
  signals.on('SIGINT', onInterrupt);

  let final: ProgressSnapshot;
  try {
    final = await followRun(runId, kitchen.registry.whenFinished(runId), kitchen, renderer);
  } catch (error) {
    spinners.stopActive();
    stderr.write(`Error: ${describeError(error)}\n`);
    return ExitCode.UNEXPECTED_ERROR;
  } finally {
    signals.removeListener('SIGINT', onInterrupt);
  }
  kitchen.registry.forget(runId);

  if (config.verbosity.jsonOutput) {
    stdout.write(`${JSON.stringify(final, null, 2)}\n`);
  }
  return exitCodeForSnapshot(final);
}
