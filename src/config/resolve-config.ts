/**
 * Configuration Resolution
 * Single-pass config resolution with explicit precedence
 * CLI flags > environment > repo config (.chef/config.json) > defaults
 */

import { existsSync, readFileSync } from 'fs';
import { isAbsolute, join, resolve } from 'path';
import { getDefaultDataDirectory } from '../catalog/catalog-provider';
import type { RepoConfig } from '../schemas/repo-config.schema';
import { parseJsonWith, validateRepoConfig } from '../schemas/validators';
import {
  ConfigSource,
  DEFAULT_CONFIG,
  EffectiveConfig,
  OutcomePolicyConfig,
} from '../types/effective-config';
import { describeError } from '../types/errors';
import type { Logger } from '../types/logger';

export const REPO_CONFIG_DIRECTORY = '.chef';
export const REPO_CONFIG_FILE = 'config.json';

/**
 * CLI flags that can override configuration
 */
export interface CliFlags {
  offline?: boolean;
  failSteps?: number[];
  failTools?: string[];
  timeoutMs?: number;
  model?: string;
  pollIntervalMs?: number;
  dataDirectory?: string;
  verbose?: boolean;
  debug?: boolean;
  jsonOutput?: boolean;
  noInteractive?: boolean;
  workingDirectory?: string;
}

/**
 * Environment variables read during resolution
 */
export type ConfigEnvironment = Readonly<Record<string, string | undefined>>;

export interface ResolveConfigOptions {
  /** Defaults to process.env */
  env?: ConfigEnvironment;
  /** Receives warnings about ignored config values */
  logger?: Logger;
  /** ISO timestamp recorded as resolvedAt */
  resolvedAt?: string;
}

/**
 * Load and validate the repo config file. A missing file is not an error;
 * an unreadable or invalid one is ignored with a warning.
 */
export function loadRepoConfig(path: string, logger?: Logger): RepoConfig | null {
  if (!existsSync(path)) {
    return null;
  }

  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    logger?.warn(`Ignoring unreadable config file ${path}: ${describeError(error)}`);
    return null;
  }

  const result = parseJsonWith(content, validateRepoConfig);
  if (!result.success || result.data === undefined) {
    logger?.warn(`Ignoring invalid config file ${path}`, { issues: result.errors ?? [] });
    return null;
  }
  return result.data;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function positiveInteger(
  name: string,
  value: string | undefined,
  logger: Logger | undefined
): number | undefined {
  const text = nonEmpty(value);
  if (text === undefined) {
    return undefined;
  }
  const parsed = Number(text);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    logger?.warn(`Ignoring ${name}="${text}": expected a positive integer`);
    return undefined;
  }
  return parsed;
}

function outcomeFromFlags(flags: CliFlags): OutcomePolicyConfig | undefined {
  if (flags.failSteps !== undefined) {
    return { mode: 'fail-steps', ordinals: [...flags.failSteps] };
  }
  if (flags.failTools !== undefined) {
    return { mode: 'fail-tools', tools: [...flags.failTools] };
  }
  return undefined;
}

/**
 * Resolve configuration from all sources with explicit precedence
 * CLI flags > environment > repo config > defaults
 */
export function resolveConfig(cliFlags: CliFlags, options: ResolveConfigOptions = {}): EffectiveConfig {
  const env = options.env ?? process.env;
  const logger = options.logger;
  const cwd = cliFlags.workingDirectory ?? process.cwd();

  const repoConfig = loadRepoConfig(join(cwd, REPO_CONFIG_DIRECTORY, REPO_CONFIG_FILE), logger);

  const envModel = nonEmpty(env.CHEF_MODEL);
  const envTimeout = positiveInteger('CHEF_DECISION_TIMEOUT_MS', env.CHEF_DECISION_TIMEOUT_MS, logger);

  // Track sources for debugging
  const sources: Record<string, ConfigSource> = {};

  // Helper to resolve a value with precedence
  function resolveValue<T>(
    key: string,
    cli: T | undefined,
    fromEnv: T | undefined,
    repo: T | undefined,
    defaultVal: T
  ): T {
    if (cli !== undefined) {
      sources[key] = 'cli';
      return cli;
    }
    if (fromEnv !== undefined) {
      sources[key] = 'env';
      return fromEnv;
    }
    if (repo !== undefined) {
      sources[key] = 'repo';
      return repo;
    }
    sources[key] = 'default';
    return defaultVal;
  }

  const apiKey = nonEmpty(env.OPENAI_API_KEY);
  if (apiKey !== undefined) {
    sources['decision.apiKey'] = 'env';
  }

  const repoDataDirectory =
    repoConfig?.dataDirectory === undefined
      ? undefined
      : isAbsolute(repoConfig.dataDirectory)
        ? repoConfig.dataDirectory
        : resolve(cwd, repoConfig.dataDirectory);

  const interactive = resolveValue(
    'interactivity.interactive',
    cliFlags.noInteractive === undefined ? undefined : !cliFlags.noInteractive,
    undefined,
    undefined,
    DEFAULT_CONFIG.interactivity.interactive
  );

  return {
    schemaVersion: '1.0.0',
    decision: {
      apiKey,
      baseUrl: resolveValue<string | undefined>(
        'decision.baseUrl',
        undefined,
        nonEmpty(env.OPENAI_BASE_URL),
        repoConfig?.baseUrl,
        undefined
      ),
      planModel: resolveValue(
        'decision.planModel',
        cliFlags.model,
        envModel,
        repoConfig?.planModel,
        DEFAULT_CONFIG.decision.planModel
      ),
      selectionModel: resolveValue(
        'decision.selectionModel',
        cliFlags.model,
        envModel,
        repoConfig?.selectionModel,
        DEFAULT_CONFIG.decision.selectionModel
      ),
      timeoutMs: resolveValue(
        'decision.timeoutMs',
        cliFlags.timeoutMs,
        envTimeout,
        repoConfig?.decisionTimeoutMs,
        DEFAULT_CONFIG.decision.timeoutMs
      ),
      offline: resolveValue(
        'decision.offline',
        cliFlags.offline,
        undefined,
        repoConfig?.offline,
        DEFAULT_CONFIG.decision.offline
      ),
      maxPlanSteps: resolveValue(
        'decision.maxPlanSteps',
        undefined,
        undefined,
        repoConfig?.maxPlanSteps,
        DEFAULT_CONFIG.decision.maxPlanSteps
      ),
    },
    simulation: {
      msPerCostUnit: resolveValue(
        'simulation.msPerCostUnit',
        undefined,
        undefined,
        repoConfig?.msPerCostUnit,
        DEFAULT_CONFIG.simulation.msPerCostUnit
      ),
      maxDelayMs: resolveValue(
        'simulation.maxDelayMs',
        undefined,
        undefined,
        repoConfig?.maxDelayMs,
        DEFAULT_CONFIG.simulation.maxDelayMs
      ),
    },
    outcome: resolveValue(
      'outcome',
      outcomeFromFlags(cliFlags),
      undefined,
      repoConfig?.outcome,
      DEFAULT_CONFIG.outcome
    ),
    polling: {
      intervalMs: resolveValue(
        'polling.intervalMs',
        cliFlags.pollIntervalMs,
        undefined,
        repoConfig?.pollIntervalMs,
        DEFAULT_CONFIG.polling.intervalMs
      ),
    },
    verbosity: {
      verbose: cliFlags.verbose ?? DEFAULT_CONFIG.verbosity.verbose,
      debug: cliFlags.debug ?? DEFAULT_CONFIG.verbosity.debug,
      jsonOutput: cliFlags.jsonOutput ?? DEFAULT_CONFIG.verbosity.jsonOutput,
    },
    interactivity: {
      interactive,
    },
    paths: {
      workingDirectory: cwd,
      dataDirectory: resolveValue(
        'paths.dataDirectory',
        cliFlags.dataDirectory === undefined ? undefined : resolve(cwd, cliFlags.dataDirectory),
        undefined,
        repoDataDirectory,
        getDefaultDataDirectory()
      ),
    },
    resolvedAt: options.resolvedAt ?? new Date().toISOString(),
    sources,
  };
}

