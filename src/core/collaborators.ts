import type {
  ActionProposal,
  ExecutionResult,
  Plan,
  PlanStep,
  ProposalOutcome,
  ScreenState,
} from '../schema/index.js';

// ── Planner ──────────────────────────────────────────────────

export interface Planner {
  /** May throw PlanningError. */
  producePlan(intent: string): Promise<Plan>;
}

// ── Vision model ─────────────────────────────────────────────

export interface ProposalRequest {
  screen: ScreenState;
  step: PlanStep;
  history: readonly ActionProposal[];
}

export interface VisionModel {
  proposeAction(request: ProposalRequest): Promise<ProposalOutcome>;
}

// ── Browser capability ───────────────────────────────────────
// The only way the core touches the browser.

export interface BrowserCapability {
  captureScreen(): Promise<ScreenState>;
  execute(proposal: ActionProposal): Promise<ExecutionResult>;
}
