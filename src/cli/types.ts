/**
 * Command-line arguments of chef-orchestrator. Null means the flag was not
 * given and lower-precedence sources decide.
 */

export interface ParsedArgs {
  /** Recipe name; empty when not given */
  recipe: string;

  /** Never call the decision service */
  offline: boolean;

  /** Steps to fail, as 0-based ordinals (given 1-based on the command line) */
  failSteps: number[] | null;

  /** Tools whose use always fails */
  failTools: string[] | null;

  /** Bound on each decision call in milliseconds */
  timeoutMs: number | null;

  /** Model for every decision */
  model: string | null;

  /** How often progress is polled in milliseconds */
  pollIntervalMs: number | null;

  /** Directory holding tools.json and ingredients.json */
  dataDirectory: string | null;

  help: boolean;
  version: boolean;

  /** Exit with a usage error instead of asking for a missing recipe */
  noInteractive: boolean;

  /** Info-level log records */
  verbose: boolean;

  /** Debug-level log records with timestamps */
  debug: boolean;

  /** Print the final snapshot as JSON instead of progress lines */
  jsonOutput: boolean;
}

export const DEFAULT_ARGS: ParsedArgs = {
  recipe: '',
  offline: false,
  failSteps: null,
  failTools: null,
  timeoutMs: null,
  model: null,
  pollIntervalMs: null,
  dataDirectory: null,
  help: false,
  version: false,
  noInteractive: false,
  verbose: false,
  debug: false,
  jsonOutput: false,
};

/** error is set, prefixed with "Error: ", when success is false */
export interface ParseResult {
  success: boolean;
  args?: ParsedArgs;
  error?: string;
}
