/**
 * Shared types and the injectable seams: clock, logger, prompter
 */

// Result type for typed error handling
export type { Result, Ok, Err } from './result';
export { ok, err, isOk, isErr } from './result';

// Exit codes
export { ExitCode, getExitCodeDescription } from './exit-codes';

// Errors
export type { DecisionSourceError, DecisionSourceErrorCode } from './errors';
export {
  createDecisionSourceError,
  CatalogLoadError,
  CancellationRequested,
  InvalidRecipeError,
  UnknownRunError,
  isCancellation,
  cancellationFromSignal,
  throwIfCancelled,
  describeError,
} from './errors';

// Prompter interface
export type { Prompter, Question, PrompterError, PrompterErrorCode } from './prompter';
export { createPrompterError } from './prompter';

// Clock interface
export type { Clock, CancelTimer } from './clock';
export { SystemClock, MockClock } from './clock';

// Logger interface
export type { Logger, LogLevel, LogEventType, LogMetadata, LogEvent, LoggerOptions } from './logger';
export {
  levelForEvent,
  compareLogLevels,
  shouldLog,
  redactSecrets,
  DEFAULT_REDACT_PATTERNS,
} from './logger';

// Kitchen domain
export type {
  DecisionOrigin,
  PlanStep,
  Plan,
  StepStatus,
  ToolOutcome,
  ToolUsageRecord,
} from './kitchen';
export { statusForOutcome } from './kitchen';

// Effective config
export type {
  EffectiveConfig,
  DecisionConfig,
  SimulationConfig,
  OutcomePolicyConfig,
  PollingConfig,
  VerbosityConfig,
  InteractivityConfig,
  PathConfig,
  ConfigSource,
} from './effective-config';
export { DEFAULT_CONFIG, redactConfigForLogging } from './effective-config';
