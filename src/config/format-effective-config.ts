/**
 * Human-readable rendering of the effective config
 * Sensitive values are redacted before display
 */

import { EffectiveConfig, redactConfigForLogging } from '../types/effective-config';

function describeOutcome(config: EffectiveConfig): string {
  const { outcome } = config;
  switch (outcome.mode) {
    case 'always-succeed':
      return 'always succeed';
    case 'fail-steps':
      return `fail steps ${outcome.ordinals.map((ordinal) => ordinal + 1).join(', ')}`;
    case 'fail-tools':
      return `fail tools ${outcome.tools.join(', ')}`;
  }
}

/**
 * Format effective config for human-readable display
 */
export function formatEffectiveConfigForDisplay(config: EffectiveConfig): string {
  const redacted = redactConfigForLogging(config);
  const { decision, simulation } = redacted;
  const lines: string[] = [];

  lines.push('Effective configuration');
  lines.push(`  Working directory:  ${redacted.paths.workingDirectory}`);
  lines.push(`  Data directory:     ${redacted.paths.dataDirectory}`);
  lines.push(`  Resolved at:        ${redacted.resolvedAt}`);
  lines.push('');
  lines.push('  Decisions');
  lines.push(`    Remote:           ${decision.offline ? 'off (offline)' : decision.apiKey ? 'on' : 'off (no API key)'}`);
  lines.push(`    API key:          ${decision.apiKey ?? 'not set'}`);
  if (decision.baseUrl) {
    lines.push(`    Base URL:         ${decision.baseUrl}`);
  }
  lines.push(`    Plan model:       ${decision.planModel}`);
  lines.push(`    Selection model:  ${decision.selectionModel}`);
  lines.push(`    Timeout:          ${decision.timeoutMs}ms`);
  lines.push(`    Max plan steps:   ${decision.maxPlanSteps}`);
  lines.push('');
  lines.push('  Simulation');
  lines.push(`    Per cost unit:    ${simulation.msPerCostUnit}ms (max ${simulation.maxDelayMs}ms)`);
  lines.push(`    Outcome policy:   ${describeOutcome(redacted)}`);
  lines.push(`    Poll interval:    ${redacted.polling.intervalMs}ms`);

  if (redacted.sources && Object.keys(redacted.sources).length > 0) {
    lines.push('');
    lines.push('  Sources');
    for (const [key, source] of Object.entries(redacted.sources)) {
      lines.push(`    ${key}: ${source}`);
    }
  }

  return lines.join('\n');
}
