/**
 * Kitchen Factory
 * Wires configuration, catalog, decision source and executors into a
 * RunRegistry. Tests swap any piece through KitchenOverrides.
 */

import { CatalogProvider, FileCatalogProvider } from '../catalog/catalog-provider';
import { CookingRun } from '../core/orchestrator';
import { RunRegistry } from '../core/run-registry';
import { createDecisionSource } from '../decision/create-decision-source';
import type { DecisionSource } from '../decision/decision-source';
import type { CompletionClient } from '../decision/remote-decision-source';
import { createOutcomePolicy, OutcomePolicy } from '../kitchen/outcome-policy';
import { PlanGenerator } from '../kitchen/plan-generator';
import { StepExecutor } from '../kitchen/step-executor';
import { createBufferLogger } from '../logging/buffer-logger';
import { createConsoleLogger } from '../logging/console-logger';
import type { Catalog } from '../schemas/catalog.schema';
import { Clock, SystemClock } from '../types/clock';
import { DEFAULT_CONFIG, EffectiveConfig } from '../types/effective-config';
import type { Logger } from '../types/logger';

/**
 * Replacements for the production pieces
 */
export interface KitchenOverrides {
  clock?: Clock;
  logger?: Logger;
  catalogProvider?: CatalogProvider;
  /** Used as is; bypasses createDecisionSource */
  decisionSource?: DecisionSource;
  /** Passed to createDecisionSource in place of the openai client */
  completionClient?: CompletionClient;
  outcomePolicy?: OutcomePolicy;
  nextRunId?: () => string;
}

/**
 * Everything a front end needs to start and observe runs
 */
export interface Kitchen {
  registry: RunRegistry;
  catalog: Catalog;
  decisionSource: DecisionSource;
  config: EffectiveConfig;
  clock: Clock;
  logger: Logger;
}

/**
 * Console logger at the level the verbosity flags ask for
 */
export function createLoggerForConfig(
  config: EffectiveConfig,
  stream?: NodeJS.WritableStream
): Logger {
  const { verbose, debug, jsonOutput } = config.verbosity;
  return createConsoleLogger({
    stream,
    minLevel: debug ? 'debug' : verbose ? 'info' : 'warn',
    jsonOutput,
    includeTimestamp: debug,
  });
}

/**
 * Build a kitchen. Loads the catalog once; it is shared read-only by all
 * runs of the registry.
 * @throws CatalogLoadError when the catalog cannot be loaded
 */
export function createKitchen(config: EffectiveConfig, overrides: KitchenOverrides = {}): Kitchen {
  const clock = overrides.clock ?? new SystemClock();
  const logger = overrides.logger ?? createLoggerForConfig(config);

  const catalogProvider =
    overrides.catalogProvider ?? new FileCatalogProvider(config.paths.dataDirectory);
  const catalog = catalogProvider.load();
  logger.event(
    'catalog_loaded',
    `Loaded ${catalog.tools.length} tools and ${catalog.ingredients.length} ingredients`,
    { tools: catalog.tools.length, ingredients: catalog.ingredients.length }
  );

  const decisionSource =
    overrides.decisionSource ??
    createDecisionSource(config, { client: overrides.completionClient });
  logger.debug(`Decision source: ${decisionSource.name}`);

  const planGenerator = new PlanGenerator({
    source: decisionSource,
    clock,
    logger,
    timeoutMs: config.decision.timeoutMs,
    maxPlanSteps: config.decision.maxPlanSteps,
  });

  const stepExecutor = new StepExecutor({
    source: decisionSource,
    clock,
    logger,
    timeoutMs: config.decision.timeoutMs,
    simulation: config.simulation,
    outcomePolicy: overrides.outcomePolicy ?? createOutcomePolicy(config.outcome),
  });

  const registry = new RunRegistry(
    (runId, recipe) =>
      new CookingRun(runId, recipe, { planGenerator, stepExecutor, catalog, clock, logger }),
    overrides.nextRunId
  );

  return { registry, catalog, decisionSource, config, clock, logger };
}

/**
 * Offline configuration for tests, with a quiet buffer logger in mind
 */
export function createTestConfig(overrides: Partial<EffectiveConfig> = {}): EffectiveConfig {
  return {
    schemaVersion: '1.0.0',
    decision: { ...DEFAULT_CONFIG.decision, offline: true },
    simulation: { ...DEFAULT_CONFIG.simulation },
    outcome: DEFAULT_CONFIG.outcome,
    polling: { ...DEFAULT_CONFIG.polling },
    verbosity: { ...DEFAULT_CONFIG.verbosity },
    interactivity: { interactive: false },
    paths: {
      workingDirectory: '/test',
      dataDirectory: '/test/data',
    },
    resolvedAt: '2025-01-01T00:00:00.000Z',
    ...overrides,
  };
}

/**
 * Kitchen with a buffer logger, for tests and embedding
 */
export function createTestKitchen(
  config: EffectiveConfig = createTestConfig(),
  overrides: KitchenOverrides = {}
): Kitchen {
  return createKitchen(config, { logger: createBufferLogger(), ...overrides });
}
