/**
 * Step Executor
 * Picks a tool and ingredients for one step, simulates using the tool and
 * reports the outcome as a ToolUsageRecord.
 */

import { findTool } from '../catalog/catalog-provider';
import { decideWithFallback } from '../decision/decide-with-fallback';
import type { DecisionSource } from '../decision/decision-source';
import { fallbackIngredients, fallbackTool } from '../decision/deterministic-source';
import type { Catalog } from '../schemas/catalog.schema';
import type { Clock } from '../types/clock';
import type { SimulationConfig } from '../types/effective-config';
import { createDecisionSourceError } from '../types/errors';
import type { DecisionOrigin, PlanStep, ToolUsageRecord } from '../types/kitchen';
import type { Logger } from '../types/logger';
import type { OutcomePolicy } from './outcome-policy';

/**
 * Tool and ingredients chosen for a step, before the tool is used
 */
export interface ToolSelection {
  ordinal: number;
  toolName: string;
  ingredients: readonly string[];
  toolSource: DecisionOrigin;
  ingredientSource: DecisionOrigin;
}

export interface StepExecutionContext {
  recipe: string;
  /** Steps before this one, for ingredient context */
  previousSteps: readonly PlanStep[];
  signal?: AbortSignal;
  /** Called once the tool and ingredients are known */
  onToolSelected?: (selection: ToolSelection) => void;
}

export interface StepExecutorOptions {
  source: DecisionSource;
  clock: Clock;
  logger: Logger;
  /** Bound on each remote selection call */
  timeoutMs: number;
  simulation: SimulationConfig;
  outcomePolicy: OutcomePolicy;
}

/**
 * Simulated duration of using a tool
 */
export function simulatedDelayMs(cost: number, simulation: SimulationConfig): number {
  return Math.max(0, Math.min(simulation.maxDelayMs, cost * simulation.msPerCostUnit));
}

export class StepExecutor {
  constructor(private readonly options: StepExecutorOptions) {}

  /**
   * Execute one step. A failed outcome is returned as a record; only
   * cancellation is thrown.
   */
  async execute(
    step: PlanStep,
    catalog: Catalog,
    context: StepExecutionContext
  ): Promise<ToolUsageRecord> {
    const { source, clock, logger, timeoutMs, simulation, outcomePolicy } = this.options;
    const { recipe, signal } = context;
    const startedAt = clock.timestamp();
    const decisionContext = {
      clock,
      logger,
      timeoutMs,
      signal,
      metadata: { recipe, step: step.ordinal },
    };

    const tool = await decideWithFallback<string>(
      {
        kind: 'tool',
        primary: (callSignal) => source.selectTool({ recipe, step, catalog }, callSignal),
        validate: (name) =>
          findTool(catalog, name)
            ? undefined
            : createDecisionSourceError('INVALID_RESPONSE', `Tool "${name}" is not in the catalog`),
        fallback: () => fallbackTool(step, catalog),
      },
      decisionContext
    );

    const known = new Set(catalog.ingredients.map((ingredient) => ingredient.name));
    const ingredients = await decideWithFallback<string[]>(
      {
        kind: 'ingredients',
        primary: (callSignal) =>
          source.selectIngredients(
            { recipe, step, previousSteps: context.previousSteps, catalog },
            callSignal
          ),
        validate: (names) => {
          if (names.length === 0) {
            return createDecisionSourceError('INVALID_RESPONSE', 'No ingredients selected');
          }
          const unknown = names.filter((name) => !known.has(name));
          return unknown.length > 0
            ? createDecisionSourceError(
                'INVALID_RESPONSE',
                `Ingredients not in the catalog: ${unknown.join(', ')}`
              )
            : undefined;
        },
        fallback: () => fallbackIngredients(step, catalog),
      },
      decisionContext
    );

    context.onToolSelected?.({
      ordinal: step.ordinal,
      toolName: tool.value,
      ingredients: ingredients.value,
      toolSource: tool.source,
      ingredientSource: ingredients.source,
    });

    const cost = findTool(catalog, tool.value)?.cost ?? 1;
    await clock.delay(simulatedDelayMs(cost, simulation), signal);

    const decision = outcomePolicy.decide({
      recipe,
      step,
      toolName: tool.value,
      ingredients: ingredients.value,
    });

    return Object.freeze({
      ordinal: step.ordinal,
      toolName: tool.value,
      ingredients: Object.freeze([...ingredients.value]),
      outcome: decision.outcome,
      detail: decision.detail,
      toolSource: tool.source,
      ingredientSource: ingredients.source,
      durationMs: clock.timestamp() - startedAt,
      timestamp: clock.iso(),
    });
  }
}
