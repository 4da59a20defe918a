/**
 * Query surface: read-only projection of a run
 *
 * A snapshot is built once per applied transition from the frozen RunState
 * and published by swapping a single reference, so readers always get a
 * complete view without coordinating with the run.
 */

import type { Plan, ToolUsageRecord } from '../types/kitchen';
import type { RunSummary } from './run-summary';
import { RunPhase, RunState, StepState, isFinishedStatus, isTerminalPhase } from './state-machine';

export interface ProgressSnapshot {
  readonly runId: string;
  readonly recipe: string;
  readonly phase: RunPhase;
  readonly plan: Plan | null;
  readonly steps: readonly StepState[];
  readonly usageLog: readonly ToolUsageRecord[];
  /** The step in progress, if any */
  readonly currentStep: StepState | null;
  readonly summary: RunSummary | null;
  readonly totalSteps: number;
  readonly finishedSteps: number;
  readonly isTerminal: boolean;
  /** Increases with every applied transition */
  readonly version: number;
  readonly startedAt: string;
  readonly updatedAt: string;
  readonly finishedAt: string | null;
}

/**
 * Project a run state into a frozen snapshot
 */
export function projectSnapshot(state: RunState): ProgressSnapshot {
  const currentStep =
    state.currentOrdinal === null
      ? null
      : state.steps.find((step) => step.ordinal === state.currentOrdinal) ?? null;

  return Object.freeze({
    runId: state.runId,
    recipe: state.recipe,
    phase: state.phase,
    plan: state.plan,
    steps: state.steps,
    usageLog: state.usageLog,
    currentStep,
    summary: state.summary,
    totalSteps: state.steps.length,
    finishedSteps: state.steps.filter((step) => isFinishedStatus(step.status)).length,
    isTerminal: isTerminalPhase(state.phase),
    version: state.version,
    startedAt: state.startedAt,
    updatedAt: state.updatedAt,
    finishedAt: state.finishedAt,
  });
}

/**
 * List the consistency rules a snapshot breaks; empty when it is sound
 */
export function checkSnapshotInvariants(snapshot: ProgressSnapshot): string[] {
  const violations: string[] = [];
  const inProgress = snapshot.steps.filter((step) => step.status === 'IN_PROGRESS');
  const finished = snapshot.steps.filter((step) => isFinishedStatus(step.status));

  if (snapshot.usageLog.length !== finished.length) {
    violations.push(
      `usage log has ${snapshot.usageLog.length} records but ${finished.length} steps are finished`
    );
  }

  if (inProgress.length > 1) {
    violations.push(`${inProgress.length} steps are in progress`);
  }

  if (snapshot.plan === null && snapshot.steps.length > 0) {
    violations.push('steps exist without a plan');
  }

  if (snapshot.plan !== null && snapshot.plan.steps.length !== snapshot.steps.length) {
    violations.push('step count differs from the plan');
  }

  if (snapshot.isTerminal && inProgress.length > 0) {
    violations.push(`step ${inProgress[0].ordinal} is in progress after the run ended`);
  }

  if (snapshot.phase === 'DONE' && finished.length !== snapshot.steps.length) {
    violations.push('run is DONE with unfinished steps');
  }

  if (snapshot.phase === 'PLANNING' && snapshot.steps.length > 0) {
    violations.push('steps exist while planning');
  }

  if (snapshot.isTerminal !== (snapshot.summary !== null)) {
    violations.push('summary must exist exactly when the run has ended');
  }

  snapshot.usageLog.forEach((record, index) => {
    if (record.ordinal !== finished[index]?.ordinal) {
      violations.push(`usage record ${index} is for step ${record.ordinal}, out of order`);
    }
  });

  return violations;
}
