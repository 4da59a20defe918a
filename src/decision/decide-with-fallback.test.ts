import { describe, it, expect } from 'vitest';
import { createBufferLogger } from '../logging/buffer-logger';
import { MockClock } from '../types/clock';
import { CancellationRequested, createDecisionSourceError } from '../types/errors';
import { err, ok } from '../types/result';
import type { DecisionResult } from './decision-source';
import { decideWithFallback } from './decide-with-fallback';

function setup() {
  const clock = new MockClock();
  const logger = createBufferLogger();
  return { clock, logger, context: { clock, logger, timeoutMs: 1000, metadata: { runId: 'cook-1' } } };
}

/** Primary that only settles when its signal aborts */
function hanging(seen: AbortSignal[]): (signal: AbortSignal) => Promise<DecisionResult<string>> {
  return (signal) =>
    new Promise((resolve) => {
      seen.push(signal);
      signal.addEventListener('abort', () =>
        resolve(err(createDecisionSourceError('TIMEOUT', 'aborted')))
      );
    });
}

describe('decideWithFallback', () => {
  it('should use the primary answer when it is valid', async () => {
    const { clock, logger, context } = setup();

    const decision = await decideWithFallback(
      { kind: 'tool', primary: async () => ok('Skillet'), fallback: () => 'Spatula' },
      context
    );

    expect(decision).toEqual({ value: 'Skillet', source: 'remote' });
    expect(clock.pendingTimers()).toBe(0);
    expect(logger.getEventsByType('decision_requested')[0].metadata).toMatchObject({
      runId: 'cook-1',
      decision: 'tool',
    });
    expect(logger.getEventsByType('decision_fallback')).toHaveLength(0);
  });

  it('should fall back when the primary reports an error', async () => {
    const { logger, context } = setup();
    const failure = createDecisionSourceError('UNAVAILABLE', 'Offline mode');

    const decision = await decideWithFallback(
      { kind: 'plan', primary: async () => err(failure), fallback: () => ['Serve'] },
      context
    );

    expect(decision).toEqual({ value: ['Serve'], source: 'fallback', fallbackReason: failure });
    const [event] = logger.getEventsByType('decision_fallback');
    expect(event.message).toBe('Using fallback plan decision: Offline mode');
    expect(event.metadata.reason).toBe('UNAVAILABLE');
  });

  it('should fall back when the validator rejects the answer', async () => {
    const { context } = setup();

    const decision = await decideWithFallback(
      {
        kind: 'tool',
        primary: async () => ok('Blowtorch'),
        validate: (name) =>
          name === 'Skillet'
            ? undefined
            : createDecisionSourceError('INVALID_RESPONSE', `Tool "${name}" is not in the catalog`),
        fallback: () => 'Skillet',
      },
      context
    );

    expect(decision.value).toBe('Skillet');
    expect(decision.source).toBe('fallback');
    expect(decision.fallbackReason).toEqual({
      code: 'INVALID_RESPONSE',
      message: 'Tool "Blowtorch" is not in the catalog',
    });
  });

  it('should treat a throwing primary as unavailable', async () => {
    const { context } = setup();

    const decision = await decideWithFallback(
      {
        kind: 'ingredients',
        primary: async () => {
          throw new Error('socket hang up');
        },
        fallback: () => [],
      },
      context
    );

    expect(decision.source).toBe('fallback');
    expect(decision.fallbackReason?.code).toBe('UNAVAILABLE');
    expect(decision.fallbackReason?.message).toBe('Decision source threw: socket hang up');
  });

  it('should time out on the clock and abort the primary call', async () => {
    const { clock, context } = setup();
    const seen: AbortSignal[] = [];

    const pending = decideWithFallback(
      { kind: 'tool', primary: hanging(seen), fallback: () => 'Spatula' },
      context
    );
    clock.advance(999);
    expect(seen[0].aborted).toBe(false);
    clock.advance(1);

    const decision = await pending;
    expect(decision.value).toBe('Spatula');
    expect(decision.fallbackReason).toEqual({
      code: 'TIMEOUT',
      message: 'No tool decision within 1000ms',
    });
    expect(seen[0].aborted).toBe(true);
  });

  it('should raise the run cancellation instead of falling back', async () => {
    const { clock, context } = setup();
    const run = new AbortController();
    const seen: AbortSignal[] = [];

    const pending = decideWithFallback(
      { kind: 'tool', primary: hanging(seen), fallback: () => 'Spatula' },
      { ...context, signal: run.signal }
    );
    run.abort(new CancellationRequested('No eggs'));

    await expect(pending).rejects.toThrow('No eggs');
    expect(seen[0].aborted).toBe(true);
    expect(clock.pendingTimers()).toBe(0);
  });

  it('should not call the primary when the run is already cancelled', async () => {
    const { context } = setup();
    const run = new AbortController();
    run.abort('Closing');
    let calls = 0;

    await expect(
      decideWithFallback(
        {
          kind: 'plan',
          primary: async () => {
            calls++;
            return ok(['Serve']);
          },
          fallback: () => ['Serve'],
        },
        { ...context, signal: run.signal }
      )
    ).rejects.toBeInstanceOf(CancellationRequested);
    expect(calls).toBe(0);
  });
});
