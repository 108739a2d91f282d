import type {
  AttemptRecord,
  ExecutorEvent,
  ExecutorState,
  StepOutcomeEntry,
  Transition,
} from '../schema/index.js';

// ── Error ────────────────────────────────────────────────────

export class InvalidTransitionError extends Error {
  readonly state: ExecutorState;
  readonly event: ExecutorEvent;

  constructor(state: ExecutorState, event: ExecutorEvent) {
    super(`No transition from ${state} on ${event}`);
    this.name = 'InvalidTransitionError';
    this.state = state;
    this.event = event;
  }
}

// ── Transition table ─────────────────────────────────────────
// Ordered as the loop walks it. Anything not listed is illegal.

export const TRANSITION_TABLE: ReadonlyArray<
  readonly [from: ExecutorState, event: ExecutorEvent, to: ExecutorState]
> = [
  ['AwaitingProposal', 'cancelled', 'StepFailed'],
  ['AwaitingProposal', 'budget_exhausted', 'StepFailed'],
  ['AwaitingProposal', 'capture_failed', 'Retrying'],
  ['AwaitingProposal', 'proposal_failed', 'Retrying'],
  ['AwaitingProposal', 'proposal_received', 'Validating'],
  ['Validating', 'rejected', 'Retrying'],
  ['Validating', 'accepted_done', 'StepDone'],
  ['Validating', 'accepted_fail', 'StepFailed'],
  ['Validating', 'accepted_action', 'Executing'],
  ['Executing', 'executed', 'AwaitingProposal'],
  ['Executing', 'execution_error', 'Retrying'],
  ['Retrying', 'retry', 'AwaitingProposal'],
];

export const INITIAL_STATE: ExecutorState = 'AwaitingProposal';

const TERMINAL_STATES: ReadonlySet<ExecutorState> = new Set([
  'StepDone',
  'StepFailed',
]);

export function isTerminalState(state: ExecutorState): boolean {
  return TERMINAL_STATES.has(state);
}

export function transition(
  state: ExecutorState,
  event: ExecutorEvent,
): Transition {
  const row = TRANSITION_TABLE.find(([from, on]) => from === state && on === event);
  if (row === undefined) {
    throw new InvalidTransitionError(state, event);
  }
  return { from: state, event, to: row[2] };
}

/** Apply events in order starting from `state`. */
export function applyEvents(
  state: ExecutorState,
  events: readonly ExecutorEvent[],
): Transition[] {
  const transitions: Transition[] = [];
  let current = state;

  for (const event of events) {
    const t = transition(current, event);
    transitions.push(t);
    current = t.to;
  }

  return transitions;
}

// ── Replay ───────────────────────────────────────────────────

/**
 * Recover the event sequence of one attempt from its recorded data alone.
 * Used to check that a trace reproduces the transitions it claims.
 */
export function eventsForAttempt(record: AttemptRecord): ExecutorEvent[] {
  if (record.screenRef === null) {
    return ['capture_failed', 'retry'];
  }

  const { validation, proposal, execution } = record;

  if (validation === null || (validation.status === 'rejected' && validation.kind === 'ProposalError')) {
    return ['proposal_failed', 'retry'];
  }
  if (validation.status === 'rejected') {
    return ['proposal_received', 'rejected', 'retry'];
  }
  if (proposal === null) {
    return ['proposal_failed', 'retry'];
  }

  switch (proposal.action) {
    case 'done':
      return ['proposal_received', 'accepted_done'];
    case 'fail':
      return ['proposal_received', 'accepted_fail'];
    default:
      return execution.status === 'executed'
        ? ['proposal_received', 'accepted_action', 'executed']
        : ['proposal_received', 'accepted_action', 'execution_error', 'retry'];
  }
}

/**
 * Fold a step's recorded attempts (and its outcome entry, if any) back
 * through the transition table.
 */
export function replayStepTransitions(
  records: readonly AttemptRecord[],
  outcomeEntry?: StepOutcomeEntry,
): Transition[] {
  const transitions: Transition[] = [];
  let state = INITIAL_STATE;

  for (const record of records) {
    const replayed = applyEvents(state, eventsForAttempt(record));
    transitions.push(...replayed);
    state = replayed.at(-1)?.to ?? state;
  }

  if (outcomeEntry !== undefined) {
    transitions.push(
      ...applyEvents(state, outcomeEntry.transitions.map((t) => t.event)),
    );
  }

  return transitions;
}
