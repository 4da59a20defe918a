/**
 * Error taxonomy for cooking runs
 *
 * Decision-source failures are values (carried in a Result and always
 * recovered by the deterministic fallback). Catalog, cancellation and recipe
 * errors are thrown.
 */

/**
 * Categories of dynamic-decision failures
 */
export type DecisionSourceErrorCode = 'UNAVAILABLE' | 'TIMEOUT' | 'INVALID_RESPONSE';

/**
 * Dynamic-decision failure
 */
export interface DecisionSourceError {
  code: DecisionSourceErrorCode;
  message: string;
  cause?: Error;
}

/**
 * Create a DecisionSourceError
 */
export function createDecisionSourceError(
  code: DecisionSourceErrorCode,
  message: string,
  cause?: unknown
): DecisionSourceError {
  const error: DecisionSourceError = { code, message };
  if (cause !== undefined) {
    error.cause = cause instanceof Error ? cause : new Error(String(cause));
  }
  return error;
}

/**
 * Raised when the tool or ingredient catalog cannot be loaded.
 * The only failure that stops a run from starting.
 */
export class CatalogLoadError extends Error {
  readonly name = 'CatalogLoadError';

  constructor(
    message: string,
    readonly path?: string,
    readonly issues: readonly string[] = []
  ) {
    super(message);
  }
}

/**
 * Raised inside a run when its cancellation has been requested
 */
export class CancellationRequested extends Error {
  readonly name = 'CancellationRequested';

  constructor(readonly reason: string = 'Run cancelled') {
    super(reason);
  }
}

/**
 * Raised when a run is started with a blank recipe name
 */
export class InvalidRecipeError extends Error {
  readonly name = 'InvalidRecipeError';

  constructor(readonly recipe: string) {
    super('Recipe name must not be empty');
  }
}

export function isCancellation(error: unknown): error is CancellationRequested {
  return error instanceof CancellationRequested;
}

/**
 * Build the cancellation error for an aborted signal, keeping the reason the
 * aborter attached when there is one
 */
export function cancellationFromSignal(signal: AbortSignal): CancellationRequested {
  const reason: unknown = signal.reason;
  if (reason instanceof CancellationRequested) {
    return reason;
  }
  if (typeof reason === 'string' && reason.length > 0) {
    return new CancellationRequested(reason);
  }
  return new CancellationRequested();
}

/**
 * Throw if the signal has been aborted
 */
export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw cancellationFromSignal(signal);
  }
}

/**
 * Message text of anything thrown
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Raised when a run id is not known to the registry
 */
export class UnknownRunError extends Error {
  readonly name = 'UnknownRunError';

  constructor(readonly runId: string) {
    super(`Unknown run: ${runId}`);
  }
}
