/**
 * Terminal summary of a run, composed from its tool usage log
 */

import type { DecisionOrigin } from '../types/kitchen';
import type { RunState } from './state-machine';

export type RunOutcome = 'completed' | 'cancelled' | 'failed';

export interface RunSummary {
  readonly outcome: RunOutcome;
  readonly recipe: string;
  /** Distinct tools in order of first use */
  readonly toolsUsed: readonly string[];
  /** Tool of every step that used one, in step order */
  readonly toolSequence: readonly string[];
  readonly succeededSteps: number;
  /** Steps that failed or were cut short by cancellation */
  readonly failedSteps: number;
  /** Steps never started */
  readonly skippedSteps: number;
  readonly planSource: DecisionOrigin | null;
  /** One-line description, e.g. "Cooked Pasta using Saucepan, Spatula" */
  readonly message: string;
  /** Cancellation or error reason */
  readonly reason?: string;
}

function outcomeOf(state: RunState): RunOutcome {
  switch (state.phase) {
    case 'CANCELLED':
      return 'cancelled';
    case 'FAILED':
      return 'failed';
    default:
      return 'completed';
  }
}

function describe(
  outcome: RunOutcome,
  state: RunState,
  toolsUsed: readonly string[],
  failedSteps: number,
  reason: string | undefined
): string {
  const finished = state.usageLog.length;
  const total = state.steps.length;

  switch (outcome) {
    case 'completed': {
      const using = toolsUsed.length > 0 ? ` using ${toolsUsed.join(', ')}` : '';
      const failures = failedSteps > 0 ? ` (${failedSteps} of ${total} steps failed)` : '';
      return `Cooked ${state.recipe}${using}${failures}`;
    }
    case 'cancelled':
      return `Cancelled ${state.recipe} after ${finished} of ${total} steps: ${reason ?? 'no reason given'}`;
    case 'failed':
      return `Failed to cook ${state.recipe}: ${reason ?? 'unknown error'}`;
  }
}

/**
 * Build the summary for a run that has reached a terminal phase
 */
export function composeSummary(state: RunState, reason?: string): RunSummary {
  const outcome = outcomeOf(state);

  const toolSequence: string[] = [];
  for (const record of state.usageLog) {
    if (record.toolName !== null && record.outcome !== 'cancelled') {
      toolSequence.push(record.toolName);
    }
  }
  const toolsUsed = [...new Set(toolSequence)];

  const succeededSteps = state.usageLog.filter((record) => record.outcome === 'succeeded').length;
  const failedSteps = state.usageLog.length - succeededSteps;
  const skippedSteps = state.steps.filter((step) => step.status === 'PENDING').length;

  const summary: RunSummary = {
    outcome,
    recipe: state.recipe,
    toolsUsed: Object.freeze(toolsUsed),
    toolSequence: Object.freeze(toolSequence),
    succeededSteps,
    failedSteps,
    skippedSteps,
    planSource: state.plan?.source ?? null,
    message: describe(outcome, state, toolsUsed, failedSteps, reason),
  };
  return Object.freeze(reason === undefined ? summary : { ...summary, reason });
}

/**
 * Plain-text rendering of a summary for the terminal
 */
export function formatRunSummary(summary: RunSummary): string {
  const lines = [
    summary.message,
    `  Steps: ${summary.succeededSteps} succeeded, ${summary.failedSteps} failed, ${summary.skippedSteps} skipped`,
  ];
  if (summary.toolSequence.length > 0) {
    lines.push(`  Tool sequence: ${summary.toolSequence.join(' -> ')}`);
  }
  if (summary.planSource !== null) {
    lines.push(`  Plan source: ${summary.planSource}`);
  }
  return lines.join('\n');
}
