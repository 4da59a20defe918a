/**
 * Scripted decision source for tests
 *
 * Answers from a script keyed by step ordinal; unscripted calls report the
 * source as unavailable. Selected steps can be held open until the test
 * releases them or the call is aborted.
 */

import type {
  DecisionResult,
  DecisionSource,
  IngredientSelectionRequest,
  PlanRequest,
  ToolSelectionRequest,
} from '../../src/decision/decision-source';
import { createDecisionSourceError } from '../../src/types/errors';
import { err, ok } from '../../src/types/result';

/**
 * Preset answers for common scenarios
 */
export const PRESET_RESPONSES = {
  UNAVAILABLE: err(createDecisionSourceError('UNAVAILABLE', 'Scripted source unavailable')),
  INVALID: err(createDecisionSourceError('INVALID_RESPONSE', 'Scripted invalid response')),
};

export interface DecisionScript {
  plan?: DecisionResult<string[]>;
  /** Tool answer per step ordinal */
  tools?: Record<number, DecisionResult<string>>;
  /** Ingredient answer per step ordinal */
  ingredients?: Record<number, DecisionResult<string[]>>;
}

export interface RecordedCall {
  kind: 'plan' | 'tool' | 'ingredients';
  ordinal?: number;
}

interface Hold {
  reached: Promise<void>;
  markReached: () => void;
  release: () => void;
  released: Promise<void>;
}

function createHold(): Hold {
  let markReached: () => void = () => undefined;
  let release: () => void = () => undefined;
  const reached = new Promise<void>((resolve) => {
    markReached = resolve;
  });
  const released = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { reached, markReached, release, released };
}

export class ScriptedDecisionSource implements DecisionSource {
  readonly name = 'scripted';
  readonly calls: RecordedCall[] = [];
  private readonly holds = new Map<number, Hold>();

  constructor(private readonly script: DecisionScript = {}) {}

  /**
   * Hold the tool selection of a step open. `reached` resolves once the
   * call arrives; the call answers after `release()` or when aborted.
   */
  holdToolSelection(ordinal: number): { reached: Promise<void>; release: () => void } {
    const hold = createHold();
    this.holds.set(ordinal, hold);
    return { reached: hold.reached, release: hold.release };
  }

  async proposePlan(_request: PlanRequest): Promise<DecisionResult<string[]>> {
    this.calls.push({ kind: 'plan' });
    return this.script.plan ?? PRESET_RESPONSES.UNAVAILABLE;
  }

  async selectTool(request: ToolSelectionRequest, signal: AbortSignal): Promise<DecisionResult<string>> {
    const { ordinal } = request.step;
    this.calls.push({ kind: 'tool', ordinal });

    const hold = this.holds.get(ordinal);
    if (hold) {
      hold.markReached();
      const aborted = new Promise<void>((resolve) => {
        signal.addEventListener('abort', () => resolve(), { once: true });
      });
      await Promise.race([hold.released, aborted]);
      if (signal.aborted) {
        return err(createDecisionSourceError('TIMEOUT', 'Scripted call aborted'));
      }
    }

    return this.script.tools?.[ordinal] ?? PRESET_RESPONSES.UNAVAILABLE;
  }

  async selectIngredients(request: IngredientSelectionRequest): Promise<DecisionResult<string[]>> {
    const { ordinal } = request.step;
    this.calls.push({ kind: 'ingredients', ordinal });
    return this.script.ingredients?.[ordinal] ?? PRESET_RESPONSES.UNAVAILABLE;
  }
}

/**
 * Script where every step gets a valid remote answer
 */
export function remoteScript(
  plan: string[],
  tools: string[],
  ingredients: string[][]
): DecisionScript {
  return {
    plan: ok(plan),
    tools: Object.fromEntries(tools.map((tool, ordinal) => [ordinal, ok(tool)])),
    ingredients: Object.fromEntries(ingredients.map((names, ordinal) => [ordinal, ok(names)])),
  };
}
