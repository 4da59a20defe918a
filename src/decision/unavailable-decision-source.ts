/**
 * Decision source used when no remote service is configured
 */

import { createDecisionSourceError } from '../types/errors';
import { err } from '../types/result';
import type { DecisionResult, DecisionSource } from './decision-source';

export class UnavailableDecisionSource implements DecisionSource {
  readonly name = 'unavailable';

  constructor(private readonly reason: string = 'No decision service configured') {}

  async proposePlan(): Promise<DecisionResult<string[]>> {
    return err(createDecisionSourceError('UNAVAILABLE', this.reason));
  }

  async selectTool(): Promise<DecisionResult<string>> {
    return err(createDecisionSourceError('UNAVAILABLE', this.reason));
  }

  async selectIngredients(): Promise<DecisionResult<string[]>> {
    return err(createDecisionSourceError('UNAVAILABLE', this.reason));
  }
}
