/**
 * Schema for the repository config file (.chef/config.json)
 * Every field is optional; CLI flags and environment variables win over it.
 */

import type { OutcomePolicyConfig } from '../types/effective-config';

export interface RepoConfig {
  planModel?: string;
  selectionModel?: string;
  baseUrl?: string;
  decisionTimeoutMs?: number;
  maxPlanSteps?: number;
  offline?: boolean;
  msPerCostUnit?: number;
  maxDelayMs?: number;
  pollIntervalMs?: number;
  /** Relative paths resolve against the working directory */
  dataDirectory?: string;
  outcome?: OutcomePolicyConfig;
}

/**
 * Example of a valid repository config
 */
export const exampleRepoConfig: RepoConfig = {
  planModel: 'gpt-4o',
  decisionTimeoutMs: 10000,
  outcome: { mode: 'fail-steps', ordinals: [2] },
};
