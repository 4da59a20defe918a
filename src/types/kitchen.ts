/**
 * Plan and tool-usage types shared by the generator, executor and run
 */

/**
 * Where a decision came from
 */
export type DecisionOrigin = 'remote' | 'fallback';

/**
 * One step of a plan, as decided once per run
 */
export interface PlanStep {
  /** Position in the plan, 0..N-1 */
  readonly ordinal: number;
  readonly description: string;
}

/**
 * Ordered, non-empty sequence of steps for one recipe
 */
export interface Plan {
  readonly recipe: string;
  readonly steps: readonly PlanStep[];
  readonly source: DecisionOrigin;
}

/**
 * Lifecycle of a step; only moves forward
 */
export type StepStatus = 'PENDING' | 'IN_PROGRESS' | 'DONE' | 'FAILED';

/**
 * Result of simulated tool use for one step
 */
export type ToolOutcome = 'succeeded' | 'failed' | 'cancelled';

/**
 * Append-only record written once per finished step
 */
export interface ToolUsageRecord {
  readonly ordinal: number;
  /** Null when the step was cancelled before a tool was chosen */
  readonly toolName: string | null;
  readonly ingredients: readonly string[];
  readonly outcome: ToolOutcome;
  /** Human-readable result line */
  readonly detail: string;
  readonly toolSource: DecisionOrigin | null;
  readonly ingredientSource: DecisionOrigin | null;
  readonly durationMs: number;
  /** ISO 8601 time the record was written */
  readonly timestamp: string;
}

/**
 * Map a tool outcome to the step status it produces
 */
export function statusForOutcome(outcome: ToolOutcome): StepStatus {
  return outcome === 'succeeded' ? 'DONE' : 'FAILED';
}
