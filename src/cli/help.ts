/**
 * Usage text for --help and argument errors
 */

import { ExitCode, getExitCodeDescription } from '../types/exit-codes';

function exitCodeLines(): string {
  return Object.values(ExitCode)
    .map((code) => `  ${code}                           ${getExitCodeDescription(code)}`)
    .join('\n');
}

export function getUsageText(): string {
  return `Usage: chef-orchestrator [recipe] [options]

Options:
  --offline                   Use the built-in fallback decisions only
  --fail-steps <n,n>          Make the given step numbers fail (1-based)
  --fail-tools <name,name>    Make every use of the given tools fail
  --timeout-ms <number>       Bound on each decision call (default: 15000)
  --model <model>             Model for plans and selections (default: gpt-4o)
  --poll-interval-ms <number> Progress refresh interval (default: 300)
  --data-dir <path>           Directory with tools.json and ingredients.json
  --no-interactive            Disable interactive prompts; fail instead
  --verbose                   Enable verbose output with more progress details
  --debug                     Enable debug mode with full diagnostics
  --json                      Output the final snapshot as JSON
  -h, --help                  Show this help message
  -v, --version               Show version number

Environment:
  OPENAI_API_KEY              Enables model-backed decisions
  OPENAI_BASE_URL             OpenAI-compatible endpoint
  CHEF_MODEL                  Model for plans and selections
  CHEF_DECISION_TIMEOUT_MS    Bound on each decision call

Examples:
  chef-orchestrator "Grilled Cheese Sandwich" --offline
  chef-orchestrator "Chicken Parm" --fail-steps 2
  chef-orchestrator Pasta --fail-tools Saucepan --json

Exit codes:
${exitCodeLines()}`;
}

export function printUsage(): void {
  console.error(getUsageText());
}
