/**
 * UI module - spinners, prompts and run progress output
 */

export { SpinnerService } from './spinner-service';
export type { SpinnerServiceConfig, Spinner, SpinnerColor, SpinnerOutcome } from './spinner-service';

export { InquirerPrompter, createInquirerPrompter } from './inquirer-prompter';
export type { InquirerPrompterConfig } from './inquirer-prompter';

export { ProgressRenderer, describeRecord, stepLabel } from './progress-renderer';
