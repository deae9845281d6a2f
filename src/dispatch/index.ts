export { ModeDispatcher, type DispatchOutcome, type Printer } from './dispatcher';
export { MODE_TABLE, resolveMode } from './modes';
export { buildPlan, toInvocation, type ExecutionPlan, type PlanStep, type StepName } from './plan';
