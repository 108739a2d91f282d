import type {
  ActionProposal,
  AttemptRecord,
  ExecutionResult,
  ExecutorEvent,
  ExecutorState,
  PlanStep,
  ProposalOutcome,
  ScreenState,
  StepOutcome,
  Transition,
  ValidationResult,
} from '../schema/index.js';
import {
  describeAction,
  MAX_RETRIES_EXCEEDED,
  RUN_CANCELLED,
} from '../schema/index.js';
import { LIMITS, TIMEOUTS } from '../config/defaults.js';
import type { TraceRecorder } from '../trace/recorder.js';
import { errorMessage, withTimeout } from '../utils/timeout.js';
import * as log from '../utils/logger.js';
import type { BrowserCapability, VisionModel } from './collaborators.js';
import { validateProposal } from './guardrails.js';
import { INITIAL_STATE, transition } from './stateMachine.js';

// ── Public types ─────────────────────────────────────────────

export interface StepExecutorDeps {
  vision: VisionModel;
  browser: BrowserCapability;
  recorder: TraceRecorder;
}

export interface StepExecutorOptions {
  maxAttempts?: number | undefined;
  vlmTimeoutMs?: number | undefined;
  actionTimeoutMs?: number | undefined;
  /** Checked between attempts; an in-flight attempt always completes. */
  signal?: AbortSignal | undefined;
  now?: (() => Date) | undefined;
}

export interface StepExecution {
  stepIndex: number;
  outcome: StepOutcome;
  attempts: number;
  history: readonly ActionProposal[];
  transitions: readonly Transition[];
}

// ── Per-step context ─────────────────────────────────────────
// Everything the loop mutates lives here, one instance per step.

interface StepLimits {
  maxAttempts: number;
  vlmTimeoutMs: number;
  actionTimeoutMs: number;
  now: () => Date;
}

interface StepContext {
  readonly stepIndex: number;
  readonly step: PlanStep;
  readonly limits: StepLimits;
  readonly signal: AbortSignal | undefined;
  attempt: number;
  state: ExecutorState;
  readonly history: ActionProposal[];
  readonly transitions: Transition[];
}

function createContext(
  step: PlanStep,
  stepIndex: number,
  options: StepExecutorOptions,
): StepContext {
  return {
    stepIndex,
    step,
    limits: {
      maxAttempts: options.maxAttempts ?? LIMITS.MAX_ATTEMPTS,
      vlmTimeoutMs: options.vlmTimeoutMs ?? TIMEOUTS.VLM_TIMEOUT,
      actionTimeoutMs: options.actionTimeoutMs ?? TIMEOUTS.ACTION_TIMEOUT,
      now: options.now ?? (() => new Date()),
    },
    signal: options.signal,
    attempt: 0,
    state: INITIAL_STATE,
    history: [],
    transitions: [],
  };
}

// ── Main entry ───────────────────────────────────────────────

/**
 * Drive one step to StepDone or StepFailed.
 *
 * Each iteration is one attempt: capture, propose, validate, and execute
 * if accepted. Every attempt is written to the trace before the next one
 * starts. Successful execution loops back for another proposal; only an
 * accepted `done` completes the step.
 */
export async function executeStep(
  step: PlanStep,
  stepIndex: number,
  deps: StepExecutorDeps,
  options: StepExecutorOptions = {},
): Promise<StepExecution> {
  const ctx = createContext(step, stepIndex, options);

  for (;;) {
    if (ctx.signal?.aborted) {
      return finish(ctx, deps, { status: 'failed', reason: RUN_CANCELLED }, 'cancelled');
    }

    ctx.attempt++;
    if (ctx.attempt > ctx.limits.maxAttempts) {
      return finish(
        ctx,
        deps,
        { status: 'failed', reason: MAX_RETRIES_EXCEEDED },
        'budget_exhausted',
      );
    }

    log.attempt(stepIndex, ctx.attempt, ctx.limits.maxAttempts);
    const outcome = await runAttempt(ctx, deps);
    if (outcome !== null) {
      return finish(ctx, deps, outcome, null);
    }
  }
}

// ── One attempt ──────────────────────────────────────────────

type AttemptFields = Pick<
  AttemptRecord,
  'screenRef' | 'proposal' | 'validation' | 'execution'
>;

const NOT_DISPATCHED: ExecutionResult = { status: 'not_dispatched' };

async function runAttempt(
  ctx: StepContext,
  deps: StepExecutorDeps,
): Promise<StepOutcome | null> {
  const attemptTransitions: Transition[] = [];

  const fire = (...events: ExecutorEvent[]): void => {
    for (const event of events) {
      const t = transition(ctx.state, event);
      ctx.state = t.to;
      attemptTransitions.push(t);
      ctx.transitions.push(t);
    }
  };

  const record = async (fields: AttemptFields): Promise<void> => {
    await deps.recorder.recordAttempt({
      stepIndex: ctx.stepIndex,
      attempt: ctx.attempt,
      ...fields,
      transitions: attemptTransitions,
      timestamp: ctx.limits.now().toISOString(),
    });
  };

  // ── CAPTURE ────────────────────────────────────────────
  let screen: ScreenState;
  try {
    screen = await withTimeout(
      () => deps.browser.captureScreen(),
      ctx.limits.actionTimeoutMs,
      'screen capture',
    );
  } catch (err) {
    const detail = `screen capture failed: ${errorMessage(err)}`;
    log.warn(detail);
    fire('capture_failed', 'retry');
    await record({
      screenRef: null,
      proposal: null,
      validation: null,
      execution: { status: 'execution_error', detail },
    });
    return null;
  }

  // ── PROPOSE ────────────────────────────────────────────
  let outcome: ProposalOutcome;
  try {
    outcome = await withTimeout(
      () =>
        deps.vision.proposeAction({
          screen,
          step: ctx.step,
          history: [...ctx.history],
        }),
      ctx.limits.vlmTimeoutMs,
      'VLM proposal',
    );
  } catch (err) {
    const reason = errorMessage(err);
    log.warn(`Proposal failed: ${reason}`);
    fire('proposal_failed', 'retry');
    await record({
      screenRef: screen.imageRef,
      proposal: null,
      validation: { status: 'rejected', kind: 'ProposalError', reason },
      execution: NOT_DISPATCHED,
    });
    return null;
  }
  fire('proposal_received');

  // ── VALIDATE ───────────────────────────────────────────
  const validation: ValidationResult = validateProposal(outcome, screen, ctx.step);

  if (!outcome.ok || validation.status === 'rejected') {
    fire('rejected', 'retry');
    if (validation.status === 'rejected') {
      log.rejected(validation.kind, validation.reason);
    }
    await record({
      screenRef: screen.imageRef,
      proposal: outcome.ok ? outcome.proposal : null,
      validation,
      execution: NOT_DISPATCHED,
    });
    return null;
  }

  const { proposal } = outcome;
  log.proposal(describeAction(proposal));

  if (proposal.action === 'done') {
    fire('accepted_done');
    await record({ screenRef: screen.imageRef, proposal, validation, execution: NOT_DISPATCHED });
    return { status: 'completed' };
  }

  if (proposal.action === 'fail') {
    fire('accepted_fail');
    await record({ screenRef: screen.imageRef, proposal, validation, execution: NOT_DISPATCHED });
    return { status: 'failed', reason: proposal.reason };
  }

  // ── EXECUTE ────────────────────────────────────────────
  fire('accepted_action');
  const execution = await dispatch(ctx, deps, proposal);

  if (execution.status === 'executed') {
    fire('executed');
    ctx.history.push(proposal);
  } else {
    log.warn(`Execution failed: ${execution.detail}`);
    fire('execution_error', 'retry');
  }

  await record({ screenRef: screen.imageRef, proposal, validation, execution });
  return null;
}

type DispatchResult = Exclude<ExecutionResult, { status: 'not_dispatched' }>;

async function dispatch(
  ctx: StepContext,
  deps: StepExecutorDeps,
  proposal: ActionProposal,
): Promise<DispatchResult> {
  let result: ExecutionResult;
  try {
    result = await withTimeout(
      () => deps.browser.execute(proposal),
      ctx.limits.actionTimeoutMs,
      describeAction(proposal),
    );
  } catch (err) {
    return { status: 'execution_error', detail: errorMessage(err) };
  }

  return result.status === 'not_dispatched'
    ? { status: 'execution_error', detail: 'browser did not dispatch the action' }
    : result;
}

// ── Terminal bookkeeping ─────────────────────────────────────

async function finish(
  ctx: StepContext,
  deps: StepExecutorDeps,
  outcome: StepOutcome,
  event: 'cancelled' | 'budget_exhausted' | null,
): Promise<StepExecution> {
  const closing: Transition[] = [];
  if (event !== null) {
    const t = transition(ctx.state, event);
    ctx.state = t.to;
    closing.push(t);
    ctx.transitions.push(t);
  }

  await deps.recorder.recordStepOutcome(
    ctx.stepIndex,
    outcome,
    closing,
    ctx.limits.now().toISOString(),
  );

  log.stepResult(ctx.stepIndex, outcome.status === 'completed', ctx.step.description);
  if (outcome.status === 'failed') {
    log.detail(`Reason: ${outcome.reason}`);
  }

  return {
    stepIndex: ctx.stepIndex,
    outcome,
    attempts: Math.min(ctx.attempt, ctx.limits.maxAttempts),
    history: [...ctx.history],
    transitions: [...ctx.transitions],
  };
}
