/**
 * Explicit State Machine for a cooking run
 *
 * All run state changes go through transition(). It is pure: it takes the
 * current frozen RunState and an event and returns the next frozen RunState,
 * or rejects the event and returns the current state unchanged.
 */

import type {
  DecisionOrigin,
  Plan,
  StepStatus,
  ToolUsageRecord,
} from '../types/kitchen';
import { statusForOutcome } from '../types/kitchen';
import { RunSummary, composeSummary } from './run-summary';

/**
 * Phases of a run. PLANNING is initial; DONE, CANCELLED and FAILED are
 * terminal.
 */
export type RunPhase = 'PLANNING' | 'COOKING' | 'DONE' | 'CANCELLED' | 'FAILED';

/**
 * Progress of one plan step
 */
export interface StepState {
  readonly ordinal: number;
  readonly description: string;
  readonly status: StepStatus;
  /** Set once a tool is chosen */
  readonly toolName: string | null;
  readonly ingredients: readonly string[];
  readonly toolSource: DecisionOrigin | null;
}

/**
 * Complete state of a run
 */
export interface RunState {
  readonly runId: string;
  readonly recipe: string;
  readonly phase: RunPhase;
  /** Write-once; null while planning */
  readonly plan: Plan | null;
  readonly steps: readonly StepState[];
  /** Append-only; one record per finished step */
  readonly usageLog: readonly ToolUsageRecord[];
  /** Ordinal of the step in progress */
  readonly currentOrdinal: number | null;
  readonly summary: RunSummary | null;
  /** Number of transitions applied so far */
  readonly version: number;
  readonly startedAt: string;
  readonly updatedAt: string;
  readonly finishedAt: string | null;
}

/**
 * Events that trigger state transitions
 */
export type RunEvent =
  | { type: 'PLAN_READY'; plan: Plan }
  | { type: 'STEP_STARTED'; ordinal: number }
  | {
      type: 'TOOL_SELECTED';
      ordinal: number;
      toolName: string;
      ingredients: readonly string[];
      toolSource: DecisionOrigin;
    }
  | { type: 'STEP_FINISHED'; record: ToolUsageRecord }
  | { type: 'COOKING_FINISHED' }
  | { type: 'CANCELLED'; reason: string; durationMs?: number }
  | { type: 'ERROR'; message: string };

/**
 * Result of a state transition
 */
export interface TransitionResult {
  /** The state after the transition (unchanged when invalid) */
  state: RunState;
  /** Whether the transition was applied */
  valid: boolean;
  /** Human-readable description of what happened */
  description: string;
}

const TERMINAL_PHASES: readonly RunPhase[] = ['DONE', 'CANCELLED', 'FAILED'];

export function isTerminalPhase(phase: RunPhase): boolean {
  return TERMINAL_PHASES.includes(phase);
}

export function isFinishedStatus(status: StepStatus): boolean {
  return status === 'DONE' || status === 'FAILED';
}

/**
 * Get human-readable description of a phase
 */
export function getPhaseDescription(phase: RunPhase): string {
  const descriptions: Record<RunPhase, string> = {
    PLANNING: 'Deciding the plan',
    COOKING: 'Executing plan steps',
    DONE: 'Run complete',
    CANCELLED: 'Run cancelled',
    FAILED: 'Run failed',
  };
  return descriptions[phase];
}

function freezeState(state: RunState): RunState {
  return Object.freeze({
    ...state,
    steps: Object.freeze(
      state.steps.map((step) =>
        Object.isFrozen(step)
          ? step
          : Object.freeze({ ...step, ingredients: Object.freeze([...step.ingredients]) })
      )
    ),
    usageLog: Object.freeze(state.usageLog.map((record) => Object.freeze(record))),
  });
}

/**
 * Create initial state for a new run
 */
export function createInitialState(runId: string, recipe: string, timestamp: string): RunState {
  return freezeState({
    runId,
    recipe,
    phase: 'PLANNING',
    plan: null,
    steps: [],
    usageLog: [],
    currentOrdinal: null,
    summary: null,
    version: 0,
    startedAt: timestamp,
    updatedAt: timestamp,
    finishedAt: null,
  });
}

function updateStep(
  steps: readonly StepState[],
  ordinal: number,
  changes: Partial<Omit<StepState, 'ordinal' | 'description'>>
): StepState[] {
  return steps.map((step) => (step.ordinal === ordinal ? { ...step, ...changes } : step));
}

function nextPendingOrdinal(state: RunState): number | undefined {
  return state.steps.find((step) => step.status === 'PENDING')?.ordinal;
}

function hasContiguousOrdinals(plan: Plan): boolean {
  return plan.steps.every((step, index) => step.ordinal === index);
}

/**
 * Record for the step that was in progress when the run stopped
 */
function interruptedRecord(
  step: StepState,
  outcome: 'failed' | 'cancelled',
  detail: string,
  durationMs: number,
  timestamp: string
): ToolUsageRecord {
  return {
    ordinal: step.ordinal,
    toolName: step.toolName,
    ingredients: step.ingredients,
    outcome,
    detail,
    toolSource: step.toolSource,
    ingredientSource: null,
    durationMs,
    timestamp,
  };
}

type Changes = Partial<Omit<RunState, 'runId' | 'recipe' | 'startedAt' | 'version' | 'updatedAt'>>;

type Outcome = { changes: Changes; description: string } | { reject: string };

function stopRun(
  state: RunState,
  phase: 'CANCELLED' | 'FAILED',
  detail: string,
  durationMs: number,
  timestamp: string
): Changes {
  const inProgress = state.steps.find((step) => step.status === 'IN_PROGRESS');
  if (!inProgress) {
    return { phase, currentOrdinal: null };
  }
  const outcome = phase === 'CANCELLED' ? 'cancelled' : 'failed';
  return {
    phase,
    currentOrdinal: null,
    steps: updateStep(state.steps, inProgress.ordinal, { status: 'FAILED' }),
    usageLog: [
      ...state.usageLog,
      interruptedRecord(inProgress, outcome, detail, durationMs, timestamp),
    ],
  };
}

function evaluate(state: RunState, event: RunEvent, timestamp: string): Outcome {
  if (isTerminalPhase(state.phase)) {
    return { reject: `Run is ${state.phase}` };
  }

  switch (event.type) {
    case 'PLAN_READY': {
      if (state.phase !== 'PLANNING') {
        return { reject: 'Plan already set' };
      }
      if (event.plan.steps.length === 0 || !hasContiguousOrdinals(event.plan)) {
        return { reject: 'Plan must be non-empty with ordinals 0..N-1' };
      }
      return {
        description: `Plan ready with ${event.plan.steps.length} steps (${event.plan.source})`,
        changes: {
          phase: 'COOKING',
          plan: event.plan,
          steps: event.plan.steps.map((step): StepState => ({
            ordinal: step.ordinal,
            description: step.description,
            status: 'PENDING',
            toolName: null,
            ingredients: [],
            toolSource: null,
          })),
        },
      };
    }

    case 'STEP_STARTED': {
      if (state.phase !== 'COOKING') {
        return { reject: 'Not cooking' };
      }
      if (state.currentOrdinal !== null) {
        return { reject: `Step ${state.currentOrdinal} is still in progress` };
      }
      const expected = nextPendingOrdinal(state);
      if (event.ordinal !== expected) {
        return { reject: `Expected step ${expected ?? 'none'}, got ${event.ordinal}` };
      }
      return {
        description: `Step ${event.ordinal} started`,
        changes: {
          currentOrdinal: event.ordinal,
          steps: updateStep(state.steps, event.ordinal, { status: 'IN_PROGRESS' }),
        },
      };
    }

    case 'TOOL_SELECTED': {
      if (state.phase !== 'COOKING' || state.currentOrdinal !== event.ordinal) {
        return { reject: `Step ${event.ordinal} is not in progress` };
      }
      return {
        description: `Step ${event.ordinal} will use ${event.toolName}`,
        changes: {
          steps: updateStep(state.steps, event.ordinal, {
            toolName: event.toolName,
            ingredients: event.ingredients,
            toolSource: event.toolSource,
          }),
        },
      };
    }

    case 'STEP_FINISHED': {
      const { record } = event;
      if (state.phase !== 'COOKING' || state.currentOrdinal !== record.ordinal) {
        return { reject: `Step ${record.ordinal} is not in progress` };
      }
      if (record.outcome === 'cancelled') {
        return { reject: 'Cancelled steps finish through CANCELLED' };
      }
      const status = statusForOutcome(record.outcome);
      return {
        description: `Step ${record.ordinal} ${status === 'DONE' ? 'done' : 'failed'}`,
        changes: {
          currentOrdinal: null,
          steps: updateStep(state.steps, record.ordinal, {
            status,
            toolName: record.toolName,
            ingredients: record.ingredients,
            toolSource: record.toolSource,
          }),
          usageLog: [...state.usageLog, record],
        },
      };
    }

    case 'COOKING_FINISHED': {
      if (state.phase !== 'COOKING') {
        return { reject: 'Not cooking' };
      }
      if (!state.steps.every((step) => isFinishedStatus(step.status))) {
        return { reject: 'Steps remain unfinished' };
      }
      return { description: 'All steps finished', changes: { phase: 'DONE' } };
    }

    case 'CANCELLED':
      return {
        description: `Cancelled: ${event.reason}`,
        changes: stopRun(state, 'CANCELLED', `Cancelled: ${event.reason}`, event.durationMs ?? 0, timestamp),
      };

    case 'ERROR':
      return {
        description: `Error: ${event.message}`,
        changes: stopRun(state, 'FAILED', `Error: ${event.message}`, 0, timestamp),
      };
  }
}

/**
 * Process an event and return the resulting state transition
 */
export function transition(state: RunState, event: RunEvent, timestamp: string): TransitionResult {
  const outcome = evaluate(state, event, timestamp);

  if ('reject' in outcome) {
    return {
      state,
      valid: false,
      description: `Invalid transition from ${state.phase} via ${event.type}: ${outcome.reject}`,
    };
  }

  const next: RunState = {
    ...state,
    ...outcome.changes,
    version: state.version + 1,
    updatedAt: timestamp,
  };

  const finished = isTerminalPhase(next.phase);
  const reason =
    event.type === 'CANCELLED' ? event.reason : event.type === 'ERROR' ? event.message : undefined;

  return {
    state: freezeState(
      finished
        ? { ...next, finishedAt: timestamp, summary: composeSummary(next, reason) }
        : next
    ),
    valid: true,
    description: outcome.description,
  };
}
