/**
 * Core orchestration module.
 * Controller → Step Executor → {VLM, guardrails, browser, trace}.
 * Pure logic. Collaborators arrive through interfaces.
 */

export { runPlan, runIntent, planIntent } from './controller.js';
export type { RunDeps, RunOptions, IntentRun, ConnectDeps } from './controller.js';
export { executeStep } from './stepExecutor.js';
export type { StepExecutorDeps, StepExecutorOptions, StepExecution } from './stepExecutor.js';
export {
  validateProposal,
  checkBounds,
  checkLockedValues,
  checkAllowedAction,
  checkSchema,
  fieldAssignments,
  describeValidation,
} from './guardrails.js';
export {
  transition,
  applyEvents,
  eventsForAttempt,
  replayStepTransitions,
  isTerminalState,
  InvalidTransitionError,
  TRANSITION_TABLE,
  INITIAL_STATE,
} from './stateMachine.js';
export { producePlan, createLLMPlanner, PlanningError } from './planner.js';
export type {
  Planner,
  VisionModel,
  ProposalRequest,
  BrowserCapability,
} from './collaborators.js';
