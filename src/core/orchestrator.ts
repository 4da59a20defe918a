/**
 * CookingRun
 * Wraps the state machine and drives one run end to end:
 * plan, then every step in ordinal order, then the terminal summary.
 * Uses dependency injection for all external interactions.
 */

import type { PlanGenerator } from '../kitchen/plan-generator';
import type { StepExecutor } from '../kitchen/step-executor';
import type { Catalog } from '../schemas/catalog.schema';
import type { Clock } from '../types/clock';
import {
  CancellationRequested,
  describeError,
  isCancellation,
  throwIfCancelled,
} from '../types/errors';
import type { ToolUsageRecord } from '../types/kitchen';
import type { Logger } from '../types/logger';
import { ProgressSnapshot, projectSnapshot } from './progress-snapshot';
import {
  RunEvent,
  RunState,
  TransitionResult,
  createInitialState,
  getPhaseDescription,
  isTerminalPhase,
  transition,
} from './state-machine';

/**
 * Dependencies required by a CookingRun
 */
export interface CookingRunDependencies {
  planGenerator: PlanGenerator;
  stepExecutor: StepExecutor;
  catalog: Catalog;
  clock: Clock;
  logger: Logger;
}

export class CookingRun {
  private state: RunState;
  private current: ProgressSnapshot;
  private readonly controller = new AbortController();
  private readonly logger: Logger;
  private running: Promise<ProgressSnapshot> | null = null;
  private stepStartedAt = 0;

  constructor(
    readonly runId: string,
    readonly recipe: string,
    private readonly deps: CookingRunDependencies
  ) {
    this.logger = deps.logger.child({ runId, recipe });
    this.state = createInitialState(runId, recipe, deps.clock.iso());
    this.current = projectSnapshot(this.state);
  }

  /**
   * Latest published snapshot. Never blocks.
   */
  snapshot(): ProgressSnapshot {
    return this.current;
  }

  /**
   * Start the run, or return the in-flight run. Resolves with the final
   * snapshot whatever the outcome.
   */
  run(): Promise<ProgressSnapshot> {
    if (!this.running) {
      this.running = this.execute();
    }
    return this.running;
  }

  /**
   * Request cancellation. Returns false when the run has already ended.
   */
  cancel(reason = 'Run cancelled'): boolean {
    if (isTerminalPhase(this.state.phase)) {
      return false;
    }
    if (!this.controller.signal.aborted) {
      this.controller.abort(new CancellationRequested(reason));
    }
    return true;
  }

  private async execute(): Promise<ProgressSnapshot> {
    const { planGenerator, stepExecutor, catalog, clock } = this.deps;
    const { signal } = this.controller;

    this.logger.event('run_started', `Cooking ${this.recipe}`);

    try {
      const plan = await planGenerator.generate(this.recipe, catalog, signal);
      this.apply({ type: 'PLAN_READY', plan });

      for (const step of plan.steps) {
        throwIfCancelled(signal);
        this.stepStartedAt = clock.timestamp();
        this.apply({ type: 'STEP_STARTED', ordinal: step.ordinal });
        this.logger.event('step_started', step.description, { step: step.ordinal });

        const record = await stepExecutor.execute(step, catalog, {
          recipe: this.recipe,
          previousSteps: plan.steps.slice(0, step.ordinal),
          signal,
          onToolSelected: (selection) =>
            this.apply({
              type: 'TOOL_SELECTED',
              ordinal: selection.ordinal,
              toolName: selection.toolName,
              ingredients: selection.ingredients,
              toolSource: selection.toolSource,
            }),
        });

        this.apply({ type: 'STEP_FINISHED', record });
        this.logStepFinished(record);
      }

      this.apply({ type: 'COOKING_FINISHED' });
      this.logger.event('run_completed', this.state.summary?.message ?? 'Run complete');
    } catch (error) {
      if (isCancellation(error)) {
        this.apply({
          type: 'CANCELLED',
          reason: error.reason,
          durationMs: this.state.currentOrdinal === null ? 0 : clock.timestamp() - this.stepStartedAt,
        });
        this.logger.event('run_cancelled', error.reason);
      } else {
        this.apply({ type: 'ERROR', message: describeError(error) });
        this.logger.event('run_failed', describeError(error));
      }
    }

    return this.current;
  }

  private logStepFinished(record: ToolUsageRecord): void {
    if (record.outcome === 'succeeded') {
      this.logger.event('step_completed', record.detail, {
        step: record.ordinal,
        tool: record.toolName,
        toolSource: record.toolSource,
      });
    } else {
      this.logger.event('step_failed', record.detail, {
        step: record.ordinal,
        tool: record.toolName,
      });
    }
  }

  /**
   * Apply an event through the state machine and publish the new snapshot
   */
  private apply(event: RunEvent): TransitionResult {
    const previousPhase = this.state.phase;
    const result = transition(this.state, event, this.deps.clock.iso());

    if (!result.valid) {
      this.logger.event('invalid_transition', result.description, {
        phase: previousPhase,
        event: event.type,
      });
      return result;
    }

    this.state = result.state;
    this.current = projectSnapshot(result.state);

    if (result.state.phase !== previousPhase) {
      this.logger.event('phase_started', getPhaseDescription(result.state.phase), {
        phase: result.state.phase,
        fromPhase: previousPhase,
        event: event.type,
      });
    }
    return result;
  }
}
