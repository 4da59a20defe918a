/**
 * Progress Renderer
 * Turns successive run snapshots into spinner lines: the plan once it is
 * known, one spinner per step, then the run summary.
 */

import type { ProgressSnapshot } from '../core/progress-snapshot';
import { formatRunSummary } from '../core/run-summary';
import type { StepState } from '../core/state-machine';
import type { ToolUsageRecord } from '../types/kitchen';
import type { Spinner, SpinnerService } from './spinner-service';

/**
 * Label for a step, numbered from 1 for display
 */
export function stepLabel(ordinal: number, description: string): string {
  return `Step ${ordinal + 1}: ${description}`;
}

/**
 * One-line description of a finished step
 */
export function describeRecord(record: ToolUsageRecord, description: string): string {
  const label = stepLabel(record.ordinal, description);
  if (record.toolName === null) {
    return `${label} - ${record.detail}`;
  }
  const ingredients = record.ingredients.length > 0 ? ` with ${record.ingredients.join(', ')}` : '';
  return `${label} - ${record.toolName}${ingredients}`;
}

export class ProgressRenderer {
  private lastVersion = -1;
  private planShown = false;
  private reportedRecords = 0;
  private spinner: Spinner | null = null;
  private spinnerOrdinal: number | null = null;
  private finished = false;

  constructor(private readonly spinners: SpinnerService) {}

  /**
   * Render whatever changed since the previous snapshot. Snapshots with a
   * version already seen are ignored.
   */
  render(snapshot: ProgressSnapshot): void {
    if (this.finished || snapshot.version <= this.lastVersion) {
      return;
    }
    this.lastVersion = snapshot.version;

    if (snapshot.plan === null) {
      if (!snapshot.isTerminal && this.spinner === null) {
        this.spinner = this.spinners.start(`Planning ${snapshot.recipe}...`, 'cyan');
      }
    } else if (!this.planShown) {
      this.showPlan(snapshot);
    }

    this.reportFinishedSteps(snapshot);

    if (snapshot.currentStep !== null) {
      this.showCurrentStep(snapshot.currentStep);
    }

    if (snapshot.isTerminal) {
      this.finish(snapshot);
    }
  }

  private showPlan(snapshot: ProgressSnapshot): void {
    const plan = snapshot.plan;
    if (plan === null) {
      return;
    }
    const heading = `Plan for ${snapshot.recipe} (${plan.source}, ${plan.steps.length} steps)`;
    if (this.spinner !== null) {
      this.spinner.settle('success', heading);
      this.spinner = null;
    } else {
      this.spinners.print(heading);
    }
    for (const step of plan.steps) {
      this.spinners.print(`  ${step.ordinal + 1}. ${step.description}`);
    }
    this.planShown = true;
  }

  private reportFinishedSteps(snapshot: ProgressSnapshot): void {
    const pending = snapshot.usageLog.slice(this.reportedRecords);
    for (const record of pending) {
      const description =
        snapshot.steps.find((step) => step.ordinal === record.ordinal)?.description ?? '';
      const spinner =
        this.spinner !== null && this.spinnerOrdinal === record.ordinal
          ? this.spinner
          : this.spinners.create(stepLabel(record.ordinal, description));

      const line = describeRecord(record, description);
      switch (record.outcome) {
        case 'succeeded':
          spinner.settle('success', line);
          break;
        case 'failed':
          spinner.settle('failure', `${line}: ${record.detail}`);
          break;
        case 'cancelled':
          spinner.settle('warning', `${stepLabel(record.ordinal, description)} - ${record.detail}`);
          break;
      }

      if (spinner === this.spinner) {
        this.spinner = null;
        this.spinnerOrdinal = null;
      }
    }
    this.reportedRecords = snapshot.usageLog.length;
  }

  private showCurrentStep(step: StepState): void {
    const label = stepLabel(step.ordinal, step.description);
    const text = step.toolName === null ? label : `${label} - using ${step.toolName}`;

    if (this.spinner === null || this.spinnerOrdinal !== step.ordinal) {
      this.spinner = this.spinners.start(text, 'yellow');
      this.spinnerOrdinal = step.ordinal;
    } else {
      this.spinner.update(text);
    }
  }

  private finish(snapshot: ProgressSnapshot): void {
    this.finished = true;
    if (this.spinner !== null) {
      this.spinner.discard();
      this.spinner = null;
    }
    this.spinners.stopActive();
    if (snapshot.summary !== null) {
      this.spinners.print('');
      this.spinners.print(formatRunSummary(snapshot.summary));
    }
  }
}
