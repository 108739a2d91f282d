import { describe, it, expect } from 'vitest';
import {
  checkAllowedAction,
  checkBounds,
  checkLockedValues,
  checkSchema,
  describeValidation,
  fieldAssignments,
  validateProposal,
} from '../guardrails.js';
import { createPlan } from '../../schema/plan.js';
import type { PlanStep, PlanStepInput } from '../../schema/plan.js';
import { parseActionProposal } from '../../schema/action.js';
import type { ActionProposal } from '../../schema/action.js';

const SCREEN = { width: 800, height: 600 };

function step(input: Omit<PlanStepInput, 'description'> = {}): PlanStep {
  const [first] = createPlan([{ description: 'Pay Rohit', ...input }]).steps;
  if (first === undefined) throw new Error('plan has no steps');
  return first;
}

const ok = (proposal: ActionProposal) => ({ ok: true as const, proposal });

describe('checkBounds', () => {
  it('should accept points inside the viewport, edges included', () => {
    expect(checkBounds({ action: 'click', x: 0, y: 0 }, SCREEN)).toBeNull();
    expect(checkBounds({ action: 'click', x: 799, y: 599 }, SCREEN)).toBeNull();
  });

  it('should reject points on or past the far edge and negatives', () => {
    expect(checkBounds({ action: 'click', x: 800, y: 10 }, SCREEN)?.kind).toBe('OutOfBoundsAction');
    expect(checkBounds({ action: 'click', x: 10, y: 600 }, SCREEN)?.kind).toBe('OutOfBoundsAction');
    expect(checkBounds({ action: 'click', x: -1, y: 10 }, SCREEN)?.reason).toBe(
      '(-1, 10) is outside the 800x600 viewport',
    );
  });

  it('should ignore actions without coordinates', () => {
    expect(checkBounds({ action: 'scroll', direction: 'down', amount: 400 }, SCREEN)).toBeNull();
  });
});

describe('fieldAssignments', () => {
  it('should report the fields an action sets', () => {
    expect(fieldAssignments({ action: 'type_text', fieldRef: 'amount', value: '500' })).toEqual([
      ['amount', '500'],
    ]);
    expect(fieldAssignments({ action: 'navigate', url: 'https://pay.example.test/' })).toEqual([
      ['url', 'https://pay.example.test/'],
    ]);
    expect(fieldAssignments({ action: 'click', x: 1, y: 1 })).toEqual([]);
  });
});

describe('checkLockedValues', () => {
  const locked = step({ lockedValues: { Amount: 500, recipient: 'Rohit' } }).lockedValues;

  it('should accept the exact locked value', () => {
    expect(
      checkLockedValues({ action: 'type_text', fieldRef: 'amount', value: '500' }, locked),
    ).toBeNull();
  });

  it('should reject any other value, even a close one', () => {
    expect(
      checkLockedValues({ action: 'type_text', fieldRef: ' AMOUNT ', value: '500.00' }, locked),
    ).toEqual({
      status: 'rejected',
      kind: 'LockViolation',
      reason: '"Amount" is locked to "500" but the proposal sets "500.00"',
      fields: ['Amount'],
    });
    expect(
      checkLockedValues({ action: 'type_text', fieldRef: 'recipient', value: 'rohit' }, locked)?.kind,
    ).toBe('LockViolation');
  });

  it('should leave unlocked fields alone', () => {
    expect(
      checkLockedValues({ action: 'type_text', fieldRef: 'note', value: 'rent' }, locked),
    ).toBeNull();
  });

  it('should apply a lock to a field name that contains the locked key', () => {
    const result = validateProposal(
      ok({ action: 'type_text', fieldRef: 'Amount (Rs)', value: '5000' }),
      SCREEN,
      step({ lockedValues: { amount: '500' } }),
    );
    expect(result).toEqual({
      status: 'rejected',
      kind: 'LockViolation',
      reason: '"amount" is locked to "500" but the proposal sets "5000"',
      fields: ['amount'],
    });
  });

  it('should reject text that embeds a locked value under any field name', () => {
    const amountLock = step({ lockedValues: { amount: '500' } }).lockedValues;

    expect(
      checkLockedValues({ action: 'type_text', fieldRef: 'Transfer sum', value: '5000' }, amountLock),
    ).toEqual({
      status: 'rejected',
      kind: 'LockViolation',
      reason: '"amount" is locked to "500" but the proposal types "5000" into "Transfer sum"',
      fields: ['amount'],
    });
    expect(
      checkLockedValues({ action: 'type_text', fieldRef: 'Transfer sum', value: '500' }, amountLock),
    ).toBeNull();
  });

  it('should lock navigation through a url key', () => {
    const urlLock = step({ lockedValues: { url: 'https://pay.example.test/' } }).lockedValues;
    expect(
      checkLockedValues({ action: 'navigate', url: 'https://evil.example.test/' }, urlLock)?.kind,
    ).toBe('LockViolation');
  });
});

describe('checkAllowedAction', () => {
  const restricted = step({ allowedActions: ['type_text'] });

  it('should reject actions outside the step list', () => {
    expect(checkAllowedAction({ action: 'click', x: 1, y: 1 }, restricted)).toEqual({
      status: 'rejected',
      kind: 'ActionNotAllowed',
      reason: 'click is not allowed for this step (allowed: type_text)',
      fields: ['action'],
    });
  });

  it('should always let done and fail through', () => {
    expect(checkAllowedAction({ action: 'done' }, restricted)).toBeNull();
    expect(checkAllowedAction({ action: 'fail', reason: 'stuck' }, restricted)).toBeNull();
  });

  it('should allow everything when the step has no list', () => {
    expect(checkAllowedAction({ action: 'click', x: 1, y: 1 }, step())).toBeNull();
  });
});

describe('validateProposal', () => {
  it('should reject an off-screen click even when a lock also applies', () => {
    const result = validateProposal(
      ok({ action: 'click', x: 9999, y: 50 }),
      SCREEN,
      step({ allowedActions: ['type_text'] }),
    );
    expect(result).toEqual({
      status: 'rejected',
      kind: 'OutOfBoundsAction',
      reason: '(9999, 50) is outside the 800x600 viewport',
      fields: ['x', 'y'],
    });
  });

  it('should check locks before the allowed-action list', () => {
    const result = validateProposal(
      ok({ action: 'navigate', url: 'https://other.example.test/' }),
      SCREEN,
      step({ lockedValues: { url: 'https://pay.example.test/' }, allowedActions: ['click'] }),
    );
    expect(result.status === 'rejected' ? result.kind : null).toBe('LockViolation');
  });

  it('should pass schema violations through with their fields', () => {
    const outcome = parseActionProposal('{"action":"click","x":1.5,"y":2}');
    const result = validateProposal(outcome, SCREEN, step());
    expect(result.status === 'rejected' ? result.kind : null).toBe('SchemaViolation');
    expect(result.status === 'rejected' ? result.fields : null).toEqual(['x']);
    expect(checkSchema(outcome)).toEqual(result);
  });

  it('should reject through checkSchema when the reply did not parse', () => {
    const outcome = parseActionProposal('[]');
    expect(validateProposal(outcome, SCREEN, step())).toEqual({
      status: 'rejected',
      kind: 'SchemaViolation',
      reason: 'Expected exactly one action, got 0',
      fields: ['(root)'],
    });
  });

  it('should accept done as a terminal signal', () => {
    expect(validateProposal(ok({ action: 'done' }), SCREEN, step())).toEqual({ status: 'accepted' });
  });
});

describe('describeValidation', () => {
  it('should summarise accepted and rejected proposals', () => {
    expect(describeValidation({ action: 'wait', ms: 500 }, { status: 'accepted' })).toBe(
      'wait 500ms → accepted',
    );
    expect(
      describeValidation(null, { status: 'rejected', kind: 'SchemaViolation', reason: 'bad json' }),
    ).toBe('(no proposal) → SchemaViolation: bad json');
  });
});
