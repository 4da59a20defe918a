/**
 * Resolved settings for one process: CLI flags over environment over
 * .chef/config.json over defaults. Passed explicitly, never read globally.
 */

export interface DecisionConfig {
  /** API key for the chat-completions endpoint; absent means fallback only */
  apiKey?: string;
  /** Override for the endpoint base URL (OpenAI-compatible servers) */
  baseUrl?: string;
  /** Model used to propose plans */
  planModel: string;
  /** Model used to pick tools and ingredients */
  selectionModel: string;
  /** Upper bound for a single decision call in milliseconds */
  timeoutMs: number;
  /** Skip the remote source even when credentials are present */
  offline: boolean;
  /** Longest plan accepted from the remote source */
  maxPlanSteps: number;
}

export interface SimulationConfig {
  /** Delay per unit of tool cost in milliseconds */
  msPerCostUnit: number;
  /** Cap on the simulated delay of a single step */
  maxDelayMs: number;
}

/** Failure injection */
export type OutcomePolicyConfig =
  | { mode: 'always-succeed' }
  | { mode: 'fail-steps'; ordinals: number[] }
  | { mode: 'fail-tools'; tools: string[] };

export interface VerbosityConfig {
  verbose: boolean;
  debug: boolean;
  /** Final snapshot as JSON on stdout, log records as JSON on stderr */
  jsonOutput: boolean;
}

export interface InteractivityConfig {
  interactive: boolean;
}

export interface PollingConfig {
  /** Time between snapshot reads by the progress observer */
  intervalMs: number;
}

export interface PathConfig {
  workingDirectory: string;
  /** Directory holding tools.json and ingredients.json */
  dataDirectory: string;
}

export type ConfigSource = 'cli' | 'env' | 'repo' | 'default';

export interface EffectiveConfig {
  schemaVersion: '1.0.0';
  decision: DecisionConfig;
  simulation: SimulationConfig;
  outcome: OutcomePolicyConfig;
  polling: PollingConfig;
  verbosity: VerbosityConfig;
  interactivity: InteractivityConfig;
  paths: PathConfig;
  resolvedAt: string;
  /** Where each value came from, keyed by dotted path such as decision.timeoutMs */
  sources?: Record<string, ConfigSource>;
}

export const DEFAULT_CONFIG: Omit<EffectiveConfig, 'resolvedAt' | 'paths'> = {
  schemaVersion: '1.0.0',
  decision: {
    planModel: 'gpt-4o',
    selectionModel: 'gpt-4o',
    timeoutMs: 15000,
    offline: false,
    maxPlanSteps: 8,
  },
  simulation: {
    msPerCostUnit: 400,
    maxDelayMs: 3000,
  },
  outcome: { mode: 'always-succeed' },
  polling: {
    intervalMs: 300,
  },
  verbosity: {
    verbose: false,
    debug: false,
    jsonOutput: false,
  },
  interactivity: {
    interactive: true,
  },
};

/**
 * Redact sensitive values from config for logging
 */
export function redactConfigForLogging(config: EffectiveConfig): EffectiveConfig {
  if (config.decision.apiKey === undefined) {
    return { ...config };
  }
  return {
    ...config,
    decision: { ...config.decision, apiKey: '[REDACTED]' },
  };
}
