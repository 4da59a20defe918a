/**
 * Process exit status of the chef-orchestrator command. A run that reaches
 * DONE exits 0 even when some of its steps failed.
 */

export const ExitCode = {
  SUCCESS: 0,
  /** Run ended FAILED, or an error escaped the command */
  UNEXPECTED_ERROR: 1,
  USAGE_ERROR: 2,
  CATALOG_ERROR: 3,
  CANCELLED: 4,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

const DESCRIPTIONS: Record<ExitCode, string> = {
  0: 'Run completed',
  1: 'Run failed or unexpected error',
  2: 'Invalid arguments or no recipe',
  3: 'Catalog could not be loaded',
  4: 'Run cancelled',
};

export function getExitCodeDescription(code: ExitCode): string {
  return DESCRIPTIONS[code];
}
