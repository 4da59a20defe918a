/**
 * Decision module - dynamic decisions with deterministic fallback
 */

export type {
  DecisionSource,
  DecisionResult,
  PlanRequest,
  ToolSelectionRequest,
  IngredientSelectionRequest,
} from './decision-source';
export type {
  CompletionClient,
  CompletionRequest,
  OpenAICompletionClientOptions,
  RemoteDecisionSourceOptions,
} from './remote-decision-source';
export { RemoteDecisionSource, OpenAICompletionClient } from './remote-decision-source';
export { UnavailableDecisionSource } from './unavailable-decision-source';
export {
  DeterministicFallbackSource,
  fallbackPlan,
  fallbackTool,
  fallbackIngredients,
  synthesizePlan,
  MINIMAL_PLAN_STEP,
} from './deterministic-source';
export type { Decision, DecisionContext, DecisionKind, DecisionRequest } from './decide-with-fallback';
export { decideWithFallback } from './decide-with-fallback';
export type { CreateDecisionSourceOptions } from './create-decision-source';
export { createDecisionSource } from './create-decision-source';
export { parsePlanText, parseToolAnswer, parseIngredientAnswer, cleanName } from './response-parsing';
