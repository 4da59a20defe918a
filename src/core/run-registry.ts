/**
 * Run registry
 * Starts runs by recipe and serves their snapshots by opaque run id.
 * Runs are independent; the catalog is the only thing they share.
 */

import { randomUUID } from 'crypto';
import { InvalidRecipeError, UnknownRunError } from '../types/errors';
import type { CookingRun } from './orchestrator';
import type { ProgressSnapshot } from './progress-snapshot';
import type { RunPhase } from './state-machine';

export type CookingRunFactory = (runId: string, recipe: string) => CookingRun;

export interface RunListing {
  runId: string;
  recipe: string;
  phase: RunPhase;
}

interface RegisteredRun {
  run: CookingRun;
  finished: Promise<ProgressSnapshot>;
}

export function generateRunId(): string {
  return `cook-${randomUUID()}`;
}

export class RunRegistry {
  private readonly runs = new Map<string, RegisteredRun>();

  constructor(
    private readonly createRun: CookingRunFactory,
    private readonly nextRunId: () => string = generateRunId
  ) {}

  /**
   * Start a run for a recipe and return its id
   * @throws InvalidRecipeError when the recipe name is blank
   */
  start(recipe: string): string {
    const name = recipe.trim();
    if (name.length === 0) {
      throw new InvalidRecipeError(recipe);
    }

    const runId = this.nextRunId();
    const run = this.createRun(runId, name);
    this.runs.set(runId, { run, finished: run.run() });
    return runId;
  }

  /**
   * Current snapshot of a run, or undefined for an unknown id
   */
  snapshot(runId: string): ProgressSnapshot | undefined {
    return this.runs.get(runId)?.run.snapshot();
  }

  /**
   * Request cancellation; false when the run is unknown or already ended
   */
  cancel(runId: string, reason?: string): boolean {
    return this.runs.get(runId)?.run.cancel(reason) ?? false;
  }

  /**
   * Resolves with the final snapshot once the run ends
   */
  whenFinished(runId: string): Promise<ProgressSnapshot> {
    const entry = this.runs.get(runId);
    if (!entry) {
      return Promise.reject(new UnknownRunError(runId));
    }
    return entry.finished;
  }

  /**
   * Drop an ended run so the registry does not hold its snapshot forever.
   * False when the run is unknown or still going.
   */
  forget(runId: string): boolean {
    const entry = this.runs.get(runId);
    if (!entry || !entry.run.snapshot().isTerminal) {
      return false;
    }
    return this.runs.delete(runId);
  }

  list(): RunListing[] {
    return [...this.runs.entries()].map(([runId, { run }]) => ({
      runId,
      recipe: run.recipe,
      phase: run.snapshot().phase,
    }));
  }

  /**
   * Cancel every run that has not ended
   */
  cancelAll(reason?: string): number {
    let cancelled = 0;
    for (const { run } of this.runs.values()) {
      if (run.cancel(reason)) {
        cancelled++;
      }
    }
    return cancelled;
  }
}
