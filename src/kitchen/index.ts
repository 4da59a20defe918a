/**
 * Kitchen module - planning, step execution and outcome policies
 */

export type { PlanGeneratorOptions } from './plan-generator';
export { PlanGenerator, toPlanSteps } from './plan-generator';
export type { StepExecutorOptions, StepExecutionContext, ToolSelection } from './step-executor';
export { StepExecutor, simulatedDelayMs } from './step-executor';
export type { OutcomePolicy, OutcomeContext, OutcomeDecision } from './outcome-policy';
export { alwaysSucceed, failSteps, failTools, createOutcomePolicy } from './outcome-policy';
