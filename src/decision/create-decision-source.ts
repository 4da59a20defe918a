/**
 * Choose the decision source for a process from its configuration.
 * The only place that looks at credentials or offline mode.
 */

import type { EffectiveConfig } from '../types/effective-config';
import type { DecisionSource } from './decision-source';
import {
  CompletionClient,
  OpenAICompletionClient,
  RemoteDecisionSource,
} from './remote-decision-source';
import { UnavailableDecisionSource } from './unavailable-decision-source';

export interface CreateDecisionSourceOptions {
  /** Replaces the openai-backed client (tests, alternative transports) */
  client?: CompletionClient;
}

export function createDecisionSource(
  config: EffectiveConfig,
  options: CreateDecisionSourceOptions = {}
): DecisionSource {
  const { apiKey, baseUrl, offline, planModel, selectionModel } = config.decision;

  if (offline) {
    return new UnavailableDecisionSource('Offline mode');
  }

  if (options.client) {
    return new RemoteDecisionSource(options.client, { planModel, selectionModel });
  }

  if (!apiKey) {
    return new UnavailableDecisionSource('No API key configured');
  }

  return new RemoteDecisionSource(new OpenAICompletionClient({ apiKey, baseUrl }), {
    planModel,
    selectionModel,
  });
}
