/**
 * Try the dynamic-decision source, fall back to the deterministic answer
 *
 * The primary call runs under a clock-driven timeout. Any
 * DecisionSourceError (unavailable, timeout, invalid response, or an answer
 * the caller's validator rejects) is recovered locally by the fallback.
 * Only cancellation of the surrounding run escapes, as CancellationRequested.
 */

import type { Clock, CancelTimer } from '../types/clock';
import {
  DecisionSourceError,
  cancellationFromSignal,
  createDecisionSourceError,
  describeError,
  throwIfCancelled,
} from '../types/errors';
import type { DecisionOrigin } from '../types/kitchen';
import type { LogMetadata, Logger } from '../types/logger';
import { err, isOk } from '../types/result';
import type { DecisionResult } from './decision-source';

export type DecisionKind = 'plan' | 'tool' | 'ingredients';

export interface DecisionRequest<T> {
  kind: DecisionKind;
  /** Call into the dynamic-decision source */
  primary: (signal: AbortSignal) => Promise<DecisionResult<T>>;
  /** Returns an error when the answer cannot be used */
  validate?: (value: T) => DecisionSourceError | undefined;
  /** Deterministic answer */
  fallback: () => T;
}

export interface DecisionContext {
  clock: Clock;
  logger: Logger;
  timeoutMs: number;
  /** Aborted when the run is cancelled */
  signal?: AbortSignal;
  metadata?: LogMetadata;
}

export interface Decision<T> {
  value: T;
  source: DecisionOrigin;
  /** Why the fallback answered, when it did */
  fallbackReason?: DecisionSourceError;
}

async function invokePrimary<T>(
  primary: (signal: AbortSignal) => Promise<DecisionResult<T>>,
  signal: AbortSignal
): Promise<DecisionResult<T>> {
  try {
    return await primary(signal);
  } catch (error) {
    return err(
      createDecisionSourceError('UNAVAILABLE', `Decision source threw: ${describeError(error)}`, error)
    );
  }
}

export async function decideWithFallback<T>(
  request: DecisionRequest<T>,
  context: DecisionContext
): Promise<Decision<T>> {
  const { clock, logger, timeoutMs, signal } = context;
  const metadata: LogMetadata = { ...context.metadata, decision: request.kind };
  throwIfCancelled(signal);

  const controller = new AbortController();
  let cancelTimer: CancelTimer = () => undefined;
  let onOuterAbort: () => void = () => undefined;

  // Both promises are created synchronously so the timer exists before the
  // first await
  const timedOut = new Promise<DecisionResult<T>>((resolve) => {
    cancelTimer = clock.schedule(timeoutMs, () => {
      controller.abort();
      resolve(
        err(createDecisionSourceError('TIMEOUT', `No ${request.kind} decision within ${timeoutMs}ms`))
      );
    });
  });

  const cancelled = new Promise<never>((_resolve, reject) => {
    if (!signal) {
      return;
    }
    onOuterAbort = () => {
      controller.abort();
      reject(cancellationFromSignal(signal));
    };
    signal.addEventListener('abort', onOuterAbort, { once: true });
  });

  logger.event('decision_requested', `Requesting ${request.kind} decision`, metadata);

  let outcome: DecisionResult<T>;
  try {
    outcome = await Promise.race([invokePrimary(request.primary, controller.signal), timedOut, cancelled]);
  } finally {
    cancelTimer();
    signal?.removeEventListener('abort', onOuterAbort);
  }
  throwIfCancelled(signal);

  if (isOk(outcome)) {
    const rejection = request.validate?.(outcome.value);
    if (rejection === undefined) {
      return { value: outcome.value, source: 'remote' };
    }
    outcome = err(rejection);
  }

  const reason = outcome.error;
  logger.event('decision_fallback', `Using fallback ${request.kind} decision: ${reason.message}`, {
    ...metadata,
    reason: reason.code,
  });
  return { value: request.fallback(), source: 'fallback', fallbackReason: reason };
}
