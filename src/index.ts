#!/usr/bin/env node

import { readFileSync } from 'fs';
import { resolve } from 'path';
import { parseArgs } from './cli/arg-parser';
import { printUsage } from './cli/help';
import { runCook } from './commands/cook';
import { describeError } from './types/errors';
import { ExitCode } from './types/exit-codes';

// Library surface
export { CookingRun } from './core/orchestrator';
export type { CookingRunDependencies } from './core/orchestrator';
export { RunRegistry, generateRunId } from './core/run-registry';
export type { RunListing } from './core/run-registry';
export { transition, createInitialState, isTerminalPhase } from './core/state-machine';
export type { RunPhase, RunState, RunEvent, StepState, TransitionResult } from './core/state-machine';
export { projectSnapshot, checkSnapshotInvariants } from './core/progress-snapshot';
export type { ProgressSnapshot } from './core/progress-snapshot';
export { composeSummary, formatRunSummary } from './core/run-summary';
export type { RunSummary, RunOutcome } from './core/run-summary';
export { FileCatalogProvider, StaticCatalogProvider } from './catalog/catalog-provider';
export type { CatalogProvider } from './catalog/catalog-provider';
export {
  DeterministicFallbackSource,
  RemoteDecisionSource,
  OpenAICompletionClient,
  UnavailableDecisionSource,
  createDecisionSource,
} from './decision';
export type { DecisionSource, CompletionClient } from './decision';
export { createKitchen } from './orchestration/kitchen-factory';
export type { Kitchen, KitchenOverrides } from './orchestration/kitchen-factory';
export { resolveConfig } from './config/resolve-config';
export type { EffectiveConfig } from './types/effective-config';
export { runCook } from './commands/cook';

/**
 * Package version, read from package.json beside src/ or dist/
 */
function readVersion(): string {
  const content: unknown = JSON.parse(
    readFileSync(resolve(__dirname, '..', 'package.json'), 'utf-8')
  );
  if (typeof content === 'object' && content !== null && 'version' in content) {
    return String(content.version);
  }
  return 'unknown';
}

// Main CLI entry point
async function main(): Promise<ExitCode> {
  const parsed = parseArgs(process.argv);
  if (!parsed.success || parsed.args === undefined) {
    console.error(parsed.error ?? 'Error: Invalid arguments');
    console.error('');
    printUsage();
    return ExitCode.USAGE_ERROR;
  }

  const args = parsed.args;
  if (args.help) {
    printUsage();
    return ExitCode.SUCCESS;
  }
  if (args.version) {
    console.log(readVersion());
    return ExitCode.SUCCESS;
  }

  return runCook(args);
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(`Error: ${describeError(error)}`);
      process.exitCode = ExitCode.UNEXPECTED_ERROR;
    });
}
