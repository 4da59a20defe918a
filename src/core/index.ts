/**
 * Core module - run state machine, cooking run and query surface
 * Must not import from ui/ or cli/.
 */

// State machine
export type { RunPhase, RunState, RunEvent, StepState, TransitionResult } from './state-machine';
export {
  createInitialState,
  transition,
  isTerminalPhase,
  isFinishedStatus,
  getPhaseDescription,
} from './state-machine';

// Terminal summary
export type { RunSummary, RunOutcome } from './run-summary';
export { composeSummary, formatRunSummary } from './run-summary';

// Query surface
export type { ProgressSnapshot } from './progress-snapshot';
export { projectSnapshot, checkSnapshotInvariants } from './progress-snapshot';

// Cooking run
export type { CookingRunDependencies } from './orchestrator';
export { CookingRun } from './orchestrator';

// Run registry
export type { CookingRunFactory, RunListing } from './run-registry';
export { RunRegistry, generateRunId } from './run-registry';
