import { describe, it, expect } from 'vitest';
import { createPlan, parsePlan } from '../plan.js';
import { parseTraceEntry } from '../trace.js';

describe('parsePlan', () => {
  it('should normalize locked values to strings', () => {
    const plan = parsePlan({
      steps: [{ description: 'Enter amount', lockedValues: { amount: 500, urgent: true } }],
    });
    expect(plan.steps[0]?.lockedValues).toEqual({ amount: '500', urgent: 'true' });
  });

  it('should default locked values and leave allowed actions unset', () => {
    const [step] = createPlan([{ description: 'Open payments' }]).steps;
    expect(step?.lockedValues).toEqual({});
    expect(step !== undefined && 'allowedActions' in step).toBe(false);
  });

  it('should freeze the plan all the way down', () => {
    const plan = createPlan([
      { description: 'Enter amount', lockedValues: { amount: '500' }, allowedActions: ['type_text'] },
    ]);
    const [step] = plan.steps;

    expect(Object.isFrozen(plan)).toBe(true);
    expect(Object.isFrozen(plan.steps)).toBe(true);
    expect(Object.isFrozen(step)).toBe(true);
    expect(Object.isFrozen(step?.lockedValues)).toBe(true);
    expect(Object.isFrozen(step?.allowedActions)).toBe(true);
    expect(step !== undefined && Reflect.set(step.lockedValues, 'amount', '1000')).toBe(false);
  });

  it('should reject empty plans and unknown actions', () => {
    expect(() => parsePlan({ steps: [] })).toThrow();
    expect(() =>
      parsePlan({ steps: [{ description: 'x', allowedActions: ['teleport'] }] }),
    ).toThrow();
  });

  it('should cap the number of steps', () => {
    const steps = Array.from({ length: 21 }, (_, i) => ({ description: `step ${String(i)}` }));
    expect(() => parsePlan({ steps })).toThrow();
  });
});

describe('parseTraceEntry', () => {
  it('should accept a step outcome entry', () => {
    const entry = {
      kind: 'step_outcome',
      stepIndex: 1,
      outcome: { status: 'failed', reason: 'max_retries_exceeded' },
      transitions: [{ from: 'AwaitingProposal', event: 'budget_exhausted', to: 'StepFailed' }],
      timestamp: '2026-01-01T00:00:00.000Z',
    };
    expect(parseTraceEntry(entry)).toEqual(entry);
  });

  it('should reject an unknown state', () => {
    expect(() =>
      parseTraceEntry({
        kind: 'step_outcome',
        stepIndex: 0,
        outcome: { status: 'completed' },
        transitions: [{ from: 'Sleeping', event: 'retry', to: 'AwaitingProposal' }],
        timestamp: '2026-01-01T00:00:00.000Z',
      }),
    ).toThrow();
  });
});
