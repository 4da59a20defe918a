/**
 * Dynamic-decision capability
 * A source proposes plans and picks tools and ingredients for steps.
 * Sources never throw: every failure comes back as a DecisionSourceError.
 */

import type { Catalog } from '../schemas/catalog.schema';
import type { DecisionSourceError } from '../types/errors';
import type { PlanStep } from '../types/kitchen';
import type { Result } from '../types/result';

export interface PlanRequest {
  recipe: string;
  catalog: Catalog;
  /** Longest plan the caller will accept */
  maxSteps: number;
}

export interface ToolSelectionRequest {
  recipe: string;
  step: PlanStep;
  catalog: Catalog;
}

export interface IngredientSelectionRequest {
  recipe: string;
  step: PlanStep;
  /** Steps that come before this one, in order */
  previousSteps: readonly PlanStep[];
  catalog: Catalog;
}

export type DecisionResult<T> = Result<T, DecisionSourceError>;

/**
 * Interface for dynamic-decision sources
 */
export interface DecisionSource {
  /** Name used in logs (e.g., 'openai', 'unavailable') */
  readonly name: string;

  /**
   * Propose the step descriptions for a recipe, in order
   */
  proposePlan(request: PlanRequest, signal: AbortSignal): Promise<DecisionResult<string[]>>;

  /**
   * Pick the one tool a step needs
   */
  selectTool(request: ToolSelectionRequest, signal: AbortSignal): Promise<DecisionResult<string>>;

  /**
   * Pick the ingredients a step handles
   */
  selectIngredients(
    request: IngredientSelectionRequest,
    signal: AbortSignal
  ): Promise<DecisionResult<string[]>>;
}
