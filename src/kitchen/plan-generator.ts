/**
 * Plan Generator
 * Turns a recipe into an ordered, non-empty plan
 */

import { decideWithFallback } from '../decision/decide-with-fallback';
import type { DecisionSource } from '../decision/decision-source';
import { fallbackPlan } from '../decision/deterministic-source';
import type { Catalog } from '../schemas/catalog.schema';
import type { Clock } from '../types/clock';
import { createDecisionSourceError } from '../types/errors';
import type { Plan, PlanStep } from '../types/kitchen';
import type { Logger } from '../types/logger';

export interface PlanGeneratorOptions {
  source: DecisionSource;
  clock: Clock;
  logger: Logger;
  /** Bound on the remote plan call */
  timeoutMs: number;
  /** Longer remote plans are truncated */
  maxPlanSteps: number;
}

export function toPlanSteps(descriptions: readonly string[]): PlanStep[] {
  return descriptions.map((description, ordinal) => Object.freeze({ ordinal, description }));
}

export class PlanGenerator {
  constructor(private readonly options: PlanGeneratorOptions) {}

  /**
   * Generate the plan. Never fails except when the signal aborts.
   */
  async generate(recipe: string, catalog: Catalog, signal?: AbortSignal): Promise<Plan> {
    const { source, clock, logger, timeoutMs, maxPlanSteps } = this.options;

    const decision = await decideWithFallback<string[]>(
      {
        kind: 'plan',
        primary: (callSignal) =>
          source.proposePlan({ recipe, catalog, maxSteps: maxPlanSteps }, callSignal),
        validate: (steps) => {
          if (steps.length === 0) {
            return createDecisionSourceError('INVALID_RESPONSE', 'Plan is empty');
          }
          if (steps.some((step) => step.trim().length === 0)) {
            return createDecisionSourceError('INVALID_RESPONSE', 'Plan contains a blank step');
          }
          return undefined;
        },
        fallback: () => fallbackPlan(recipe, catalog),
      },
      { clock, logger, timeoutMs, signal, metadata: { recipe } }
    );

    const trimmed = decision.value.map((step) => step.trim());
    const descriptions = decision.source === 'remote' ? trimmed.slice(0, maxPlanSteps) : trimmed;
    return Object.freeze({
      recipe,
      steps: Object.freeze(toPlanSteps(descriptions)),
      source: decision.source,
    });
  }
}
