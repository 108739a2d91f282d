import { z } from 'zod';

import { LIMITS } from '../config/defaults.js';
import { actionNameSchema } from './action.js';

// ── Locked values ───────────────────────────────────────────
// Planners emit amounts as numbers as often as strings; both are
// normalized to the string the VLM has to reproduce verbatim.

export const lockedValueSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((v) => String(v));

export const lockedValuesSchema = z.record(z.string().min(1), lockedValueSchema);

export type LockedValues = Readonly<Record<string, string>>;

// ── Step ────────────────────────────────────────────────────

export const planStepSchema = z.object({
  description: z.string().min(1),
  lockedValues: lockedValuesSchema.optional().default({}),
  allowedActions: z.array(actionNameSchema).min(1).optional(),
});

export type PlanStepInput = z.input<typeof planStepSchema>;

export interface PlanStep {
  readonly description: string;
  readonly lockedValues: LockedValues;
  readonly allowedActions?: readonly z.infer<typeof actionNameSchema>[] | undefined;
}

// ── Plan ────────────────────────────────────────────────────

export const planSchema = z.object({
  steps: z.array(planStepSchema).min(1).max(LIMITS.MAX_PLAN_STEPS),
});

export interface Plan {
  readonly steps: readonly PlanStep[];
}

// ── Parser ──────────────────────────────────────────────────

/**
 * Validate planner output and freeze it.
 * Locked values cannot change after this point.
 */
export function parsePlan(data: unknown): Plan {
  const parsed = planSchema.parse(data);
  return freezePlan(parsed);
}

export function createPlan(steps: readonly PlanStepInput[]): Plan {
  return parsePlan({ steps });
}

function freezePlan(plan: z.infer<typeof planSchema>): Plan {
  const steps = plan.steps.map((step): PlanStep => {
    const frozen: PlanStep = {
      description: step.description,
      lockedValues: Object.freeze({ ...step.lockedValues }),
      ...(step.allowedActions !== undefined
        ? { allowedActions: Object.freeze([...step.allowedActions]) }
        : {}),
    };
    return Object.freeze(frozen);
  });

  return Object.freeze({ steps: Object.freeze(steps) });
}
