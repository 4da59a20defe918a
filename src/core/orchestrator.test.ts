/**
 * Tests for CookingRun
 */

import { describe, it, expect } from 'vitest';
import { StaticCatalogProvider } from '../catalog/catalog-provider';
import { UnavailableDecisionSource } from '../decision/unavailable-decision-source';
import type { DecisionSource } from '../decision/decision-source';
import { alwaysSucceed, failSteps, OutcomePolicy } from '../kitchen/outcome-policy';
import { PlanGenerator } from '../kitchen/plan-generator';
import { StepExecutor } from '../kitchen/step-executor';
import { BufferLogger, createBufferLogger } from '../logging/buffer-logger';
import { exampleCatalog } from '../schemas/catalog.schema';
import { SystemClock } from '../types/clock';
import { CookingRun } from './orchestrator';
import { checkSnapshotInvariants } from './progress-snapshot';

interface Harness {
  run: CookingRun;
  logger: BufferLogger;
}

function createRun(
  recipe: string,
  options: { source?: DecisionSource; outcomePolicy?: OutcomePolicy } = {}
): Harness {
  const clock = new SystemClock();
  const logger = createBufferLogger();
  const source = options.source ?? new UnavailableDecisionSource('Offline mode');
  const catalog = new StaticCatalogProvider(exampleCatalog.tools, exampleCatalog.ingredients).load();

  const planGenerator = new PlanGenerator({ source, clock, logger, timeoutMs: 1000, maxPlanSteps: 8 });
  const stepExecutor = new StepExecutor({
    source,
    clock,
    logger,
    timeoutMs: 1000,
    simulation: { msPerCostUnit: 0, maxDelayMs: 0 },
    outcomePolicy: options.outcomePolicy ?? alwaysSucceed,
  });

  const run = new CookingRun('cook-test', recipe, { planGenerator, stepExecutor, catalog, clock, logger });
  return { run, logger };
}

describe('CookingRun', () => {
  it('should start in PLANNING before run() is called', () => {
    const { run } = createRun('Grilled Cheese');
    const snapshot = run.snapshot();
    expect(snapshot.phase).toBe('PLANNING');
    expect(snapshot.version).toBe(0);
    expect(snapshot.runId).toBe('cook-test');
  });

  it('should cook every step of the fallback plan', async () => {
    const { run } = createRun('Grilled Cheese');
    const final = await run.run();

    expect(final.phase).toBe('DONE');
    expect(final.plan?.source).toBe('fallback');
    expect(final.steps.map((step) => step.description)).toEqual([
      'Prepare ingredients',
      'Cook main components',
      'Serve hot',
    ]);
    expect(final.usageLog.map((record) => record.toolName)).toEqual([
      'Chopping Board',
      'Skillet',
      'Spatula',
    ]);
    expect(final.summary?.message).toBe('Cooked Grilled Cheese using Chopping Board, Skillet, Spatula');
    expect(checkSnapshotInvariants(final)).toEqual([]);
  });

  it('should return the same promise from repeated run() calls', () => {
    const { run } = createRun('Toast');
    const first = run.run();
    expect(run.run()).toBe(first);
    return first;
  });

  it('should log the run lifecycle with run context', async () => {
    const { run, logger } = createRun('Grilled Cheese');
    await run.run();

    const types = logger.getEvents().map((event) => event.eventType);
    expect(types[0]).toBe('run_started');
    expect(types.filter((type) => type === 'step_started')).toHaveLength(3);
    expect(types.filter((type) => type === 'step_completed')).toHaveLength(3);
    expect(types[types.length - 1]).toBe('run_completed');

    const phases = logger.getEventsByType('phase_started').map((event) => event.metadata.phase);
    expect(phases).toEqual(['COOKING', 'DONE']);
    expect(logger.getEventsByType('run_started')[0].metadata).toMatchObject({
      runId: 'cook-test',
      recipe: 'Grilled Cheese',
    });
  });

  it('should keep cooking after a failed step', async () => {
    const { run, logger } = createRun('Grilled Cheese', { outcomePolicy: failSteps([1]) });
    const final = await run.run();

    expect(final.phase).toBe('DONE');
    expect(final.steps.map((step) => step.status)).toEqual(['DONE', 'FAILED', 'DONE']);
    expect(final.usageLog[1].detail).toBe(
      'Skillet failed for: Cook main components (injected failure at step 2)'
    );
    expect(logger.getEventsByType('step_failed')).toHaveLength(1);
    expect(final.summary?.failedSteps).toBe(1);
  });

  it('should cancel during planning when cancelled before the plan exists', async () => {
    const { run, logger } = createRun('Toast');
    const finished = run.run();
    expect(run.cancel('Changed my mind')).toBe(true);

    const final = await finished;
    expect(final.phase).toBe('CANCELLED');
    expect(final.plan).toBeNull();
    expect(final.summary?.reason).toBe('Changed my mind');
    expect(logger.getEventsByType('run_cancelled')[0].message).toBe('Changed my mind');
  });

  it('should refuse to cancel a finished run', async () => {
    const { run } = createRun('Toast');
    await run.run();
    expect(run.cancel()).toBe(false);
  });

  it('should move to FAILED when a step throws', async () => {
    const broken: OutcomePolicy = {
      name: 'broken',
      decide: () => {
        throw new Error('kaboom');
      },
    };
    const { run, logger } = createRun('Toast', { outcomePolicy: broken });
    const final = await run.run();

    expect(final.phase).toBe('FAILED');
    expect(final.usageLog).toHaveLength(1);
    expect(final.usageLog[0]).toMatchObject({ ordinal: 0, outcome: 'failed', detail: 'Error: kaboom' });
    expect(final.summary?.message).toBe('Failed to cook Toast: kaboom');
    expect(logger.getEventsByType('run_failed')).toHaveLength(1);
  });

  it('should publish new snapshots without changing earlier ones', async () => {
    const { run } = createRun('Grilled Cheese');
    const before = run.snapshot();
    await run.run();

    expect(before.phase).toBe('PLANNING');
    expect(before.steps).toEqual([]);
    expect(Object.isFrozen(before)).toBe(true);
    expect(run.snapshot()).not.toBe(before);
  });
});
