/**
 * Outcome policies decide whether a simulated tool use succeeds.
 * The default always succeeds; the others inject failures for testing.
 */

import type { OutcomePolicyConfig } from '../types/effective-config';
import type { PlanStep } from '../types/kitchen';

export interface OutcomeContext {
  recipe: string;
  step: PlanStep;
  toolName: string;
  ingredients: readonly string[];
}

export interface OutcomeDecision {
  outcome: 'succeeded' | 'failed';
  detail: string;
}

export interface OutcomePolicy {
  readonly name: string;
  decide(context: OutcomeContext): OutcomeDecision;
}

function succeeded(context: OutcomeContext): OutcomeDecision {
  return {
    outcome: 'succeeded',
    detail: `Successfully used ${context.toolName} for: ${context.step.description}`,
  };
}

function failed(context: OutcomeContext, why: string): OutcomeDecision {
  return {
    outcome: 'failed',
    detail: `${context.toolName} failed for: ${context.step.description} (${why})`,
  };
}

export const alwaysSucceed: OutcomePolicy = {
  name: 'always-succeed',
  decide: succeeded,
};

/**
 * Fail the steps at the given ordinals
 */
export function failSteps(ordinals: readonly number[]): OutcomePolicy {
  const failing = new Set(ordinals);
  return {
    name: 'fail-steps',
    decide: (context) =>
      failing.has(context.step.ordinal)
        ? failed(context, `injected failure at step ${context.step.ordinal + 1}`)
        : succeeded(context),
  };
}

/**
 * Fail every use of the named tools
 */
export function failTools(toolNames: readonly string[]): OutcomePolicy {
  const failing = new Set(toolNames);
  return {
    name: 'fail-tools',
    decide: (context) =>
      failing.has(context.toolName)
        ? failed(context, `injected failure for ${context.toolName}`)
        : succeeded(context),
  };
}

export function createOutcomePolicy(config: OutcomePolicyConfig): OutcomePolicy {
  switch (config.mode) {
    case 'always-succeed':
      return alwaysSucceed;
    case 'fail-steps':
      return failSteps(config.ordinals);
    case 'fail-tools':
      return failTools(config.tools);
  }
}
