import type { Plan, RunResult, StepOutcome } from '../schema/index.js';
import { TIMEOUTS } from '../config/defaults.js';
import { errorMessage, withTimeout } from '../utils/timeout.js';
import * as log from '../utils/logger.js';
import type { Planner } from './collaborators.js';
import { PlanningError } from './planner.js';
import { executeStep } from './stepExecutor.js';
import type { StepExecutorDeps, StepExecutorOptions } from './stepExecutor.js';

// ── Public types ─────────────────────────────────────────────

export type RunDeps = StepExecutorDeps;

export interface RunOptions extends StepExecutorOptions {
  plannerTimeoutMs?: number | undefined;
}

export interface IntentRun {
  plan: Plan;
  result: RunResult;
}

// ── Plan execution ───────────────────────────────────────────

/**
 * Execute the plan's steps strictly in order.
 * The first failed step aborts the run; later steps never start.
 */
export async function runPlan(
  plan: Plan,
  deps: RunDeps,
  options: RunOptions = {},
): Promise<RunResult> {
  const outcomes: StepOutcome[] = [];
  const total = plan.steps.length;

  for (const [index, step] of plan.steps.entries()) {
    log.step(index, total, step.description);

    const execution = await executeStep(step, index, deps, options);
    outcomes.push(execution.outcome);

    if (execution.outcome.status === 'failed') {
      log.error(
        `Run aborted at step ${String(index + 1)}: ${execution.outcome.reason}`,
      );
      return {
        status: { kind: 'aborted', atStep: index, reason: execution.outcome.reason },
        steps: outcomes,
      };
    }
  }

  return { status: { kind: 'succeeded' }, steps: outcomes };
}

// ── Intent execution ─────────────────────────────────────────

/**
 * Ask the planner for a plan, bounded by the planner timeout. Every
 * failure surfaces as PlanningError.
 */
export async function planIntent(
  intent: string,
  planner: Planner,
  options: Pick<RunOptions, 'plannerTimeoutMs'> = {},
): Promise<Plan> {
  try {
    return await withTimeout(
      () => planner.producePlan(intent),
      options.plannerTimeoutMs ?? TIMEOUTS.PLANNER_TIMEOUT,
      'planner',
    );
  } catch (err) {
    if (err instanceof PlanningError) throw err;
    throw new PlanningError(errorMessage(err));
  }
}

/** Opens the run's collaborators once a plan exists. */
export type ConnectDeps = (plan: Plan) => Promise<RunDeps>;

/**
 * Plan, then run. `connect` is only called after planning succeeds, so a
 * PlanningError leaves the browser untouched.
 */
export async function runIntent(
  intent: string,
  planner: Planner,
  connect: ConnectDeps,
  options: RunOptions = {},
): Promise<IntentRun> {
  log.section(`Plan: ${intent}`);
  const plan = await planIntent(intent, planner, options);
  const deps = await connect(plan);

  log.section('Execution');
  const result = await runPlan(plan, deps, options);
  return { plan, result };
}
