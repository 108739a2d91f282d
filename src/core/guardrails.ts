import type {
  ActionProposal,
  ProposalOutcome,
  PlanStep,
  ScreenState,
  ValidationResult,
  Rejection,
} from '../schema/index.js';
import { describeAction, isTerminalAction } from '../schema/index.js';

// ── Result helpers ───────────────────────────────────────────

const ACCEPTED: ValidationResult = Object.freeze({ status: 'accepted' });

function reject(
  kind: Rejection['kind'],
  reason: string,
  fields?: readonly string[],
): Rejection {
  return {
    status: 'rejected',
    kind,
    reason,
    ...(fields !== undefined ? { fields: [...fields] } : {}),
  };
}

// ── Individual checks ────────────────────────────────────────
// Each returns null when the check passes.

export function checkSchema(outcome: Extract<ProposalOutcome, { ok: false }>): Rejection;
export function checkSchema(outcome: ProposalOutcome): Rejection | null;
export function checkSchema(outcome: ProposalOutcome): Rejection | null {
  if (outcome.ok) return null;
  return reject('SchemaViolation', outcome.violation.message, outcome.violation.fields);
}

/** Off-screen targets are rejected, never clamped. */
export function checkBounds(
  proposal: ActionProposal,
  screen: Pick<ScreenState, 'width' | 'height'>,
): Rejection | null {
  if (proposal.action !== 'click') return null;

  const { x, y } = proposal;
  if (x >= 0 && x < screen.width && y >= 0 && y < screen.height) return null;

  return reject(
    'OutOfBoundsAction',
    `(${String(x)}, ${String(y)}) is outside the ${String(screen.width)}x${String(screen.height)} viewport`,
    ['x', 'y'],
  );
}

/**
 * Field assignments an action would make, keyed by field name.
 * `type_text` sets its `fieldRef`; `navigate` sets `url`.
 */
export function fieldAssignments(
  proposal: ActionProposal,
): ReadonlyArray<readonly [string, string]> {
  switch (proposal.action) {
    case 'type_text':
      return [[proposal.fieldRef, proposal.value]];
    case 'navigate':
      return [['url', proposal.url]];
    default:
      return [];
  }
}

function normalizeKey(key: string): string {
  return key.trim().toLowerCase();
}

type LockedEntry = readonly [key: string, value: string];

/**
 * The lock a field name falls under: an exact key match first, then any
 * locked key the name contains ("Amount (Rs)" is `amount`).
 */
function lockFor(field: string, locked: readonly LockedEntry[]): LockedEntry | undefined {
  const name = normalizeKey(field);
  return (
    locked.find(([key]) => normalizeKey(key) === name) ??
    locked.find(([key]) => normalizeKey(key).length > 0 && name.includes(normalizeKey(key)))
  );
}

export function checkLockedValues(
  proposal: ActionProposal,
  lockedValues: PlanStep['lockedValues'],
): Rejection | null {
  const locked: LockedEntry[] = Object.entries(lockedValues);

  for (const [field, value] of fieldAssignments(proposal)) {
    const entry = lockFor(field, locked);
    if (entry !== undefined && value !== entry[1]) {
      const [key, lockedValue] = entry;
      return reject(
        'LockViolation',
        `"${key}" is locked to "${lockedValue}" but the proposal sets "${value}"`,
        [key],
      );
    }
  }

  // Whatever the field is called, typed text may not embed a locked value
  // with something around it.
  if (proposal.action === 'type_text') {
    const { fieldRef, value } = proposal;
    for (const [key, lockedValue] of locked) {
      if (lockedValue.length > 0 && value !== lockedValue && value.includes(lockedValue)) {
        return reject(
          'LockViolation',
          `"${key}" is locked to "${lockedValue}" but the proposal types "${value}" into "${fieldRef}"`,
          [key],
        );
      }
    }
  }

  return null;
}

export function checkAllowedAction(
  proposal: ActionProposal,
  step: PlanStep,
): Rejection | null {
  if (step.allowedActions === undefined || isTerminalAction(proposal)) {
    return null;
  }
  if (step.allowedActions.includes(proposal.action)) return null;

  return reject(
    'ActionNotAllowed',
    `${proposal.action} is not allowed for this step (allowed: ${step.allowedActions.join(', ')})`,
    ['action'],
  );
}

// ── Validator ────────────────────────────────────────────────

/**
 * Check a proposal against the schema, the current viewport, the step's
 * locked values and its allowed actions, in that order. First failure wins.
 *
 * `done` and `fail` carry no coordinates or field values, so they pass
 * through every check and are accepted as terminal signals.
 */
export function validateProposal(
  outcome: ProposalOutcome,
  screen: Pick<ScreenState, 'width' | 'height'>,
  step: PlanStep,
): ValidationResult {
  if (!outcome.ok) return checkSchema(outcome);

  const { proposal } = outcome;

  return (
    checkBounds(proposal, screen) ??
    checkLockedValues(proposal, step.lockedValues) ??
    checkAllowedAction(proposal, step) ??
    ACCEPTED
  );
}

/** One-line summary of a validation result for logs and reports. */
export function describeValidation(
  proposal: ActionProposal | null,
  result: ValidationResult,
): string {
  const action = proposal !== null ? describeAction(proposal) : '(no proposal)';
  return result.status === 'accepted'
    ? `${action} → accepted`
    : `${action} → ${result.kind}: ${result.reason}`;
}
