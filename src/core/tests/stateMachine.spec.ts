import { describe, it, expect } from 'vitest';
import {
  INITIAL_STATE,
  InvalidTransitionError,
  TRANSITION_TABLE,
  applyEvents,
  eventsForAttempt,
  isTerminalState,
  replayStepTransitions,
  transition,
} from '../stateMachine.js';
import type { AttemptRecord } from '../../schema/trace.js';

function record(overrides: Partial<AttemptRecord>): AttemptRecord {
  return {
    stepIndex: 0,
    attempt: 1,
    screenRef: 'screen-1.png',
    proposal: { action: 'click', x: 1, y: 1 },
    validation: { status: 'accepted' },
    execution: { status: 'executed' },
    transitions: [],
    timestamp: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('transition', () => {
  it('should follow the table', () => {
    expect(transition('AwaitingProposal', 'proposal_received')).toEqual({
      from: 'AwaitingProposal',
      event: 'proposal_received',
      to: 'Validating',
    });
    expect(transition('Executing', 'executed').to).toBe('AwaitingProposal');
    expect(transition('Retrying', 'retry').to).toBe('AwaitingProposal');
  });

  it('should throw on an event the state does not accept', () => {
    expect(() => transition('Validating', 'executed')).toThrow(InvalidTransitionError);
    expect(() => transition('StepDone', 'retry')).toThrow('No transition from StepDone on retry');
  });

  it('should have no way into or out of AwaitingConfirmation', () => {
    const touching = TRANSITION_TABLE.filter(
      ([from, , to]) => from === 'AwaitingConfirmation' || to === 'AwaitingConfirmation',
    );
    expect(touching).toEqual([]);
  });

  it('should have no rows leaving a terminal state', () => {
    expect(TRANSITION_TABLE.filter(([from]) => isTerminalState(from))).toEqual([]);
  });
});

describe('applyEvents', () => {
  it('should chain transitions from the given state', () => {
    const transitions = applyEvents(INITIAL_STATE, [
      'proposal_received',
      'rejected',
      'retry',
      'budget_exhausted',
    ]);
    expect(transitions.map((t) => t.to)).toEqual([
      'Validating',
      'Retrying',
      'AwaitingProposal',
      'StepFailed',
    ]);
  });
});

describe('eventsForAttempt', () => {
  it('should derive events from the recorded data', () => {
    expect(eventsForAttempt(record({ screenRef: null, proposal: null, validation: null }))).toEqual([
      'capture_failed',
      'retry',
    ]);
    expect(
      eventsForAttempt(
        record({
          proposal: null,
          validation: { status: 'rejected', kind: 'ProposalError', reason: 'timeout' },
          execution: { status: 'not_dispatched' },
        }),
      ),
    ).toEqual(['proposal_failed', 'retry']);
    expect(
      eventsForAttempt(
        record({
          validation: { status: 'rejected', kind: 'OutOfBoundsAction', reason: 'off screen' },
          execution: { status: 'not_dispatched' },
        }),
      ),
    ).toEqual(['proposal_received', 'rejected', 'retry']);
    expect(eventsForAttempt(record({ proposal: { action: 'done' } }))).toEqual([
      'proposal_received',
      'accepted_done',
    ]);
    expect(eventsForAttempt(record({ proposal: { action: 'fail', reason: 'stuck' } }))).toEqual([
      'proposal_received',
      'accepted_fail',
    ]);
    expect(eventsForAttempt(record({}))).toEqual([
      'proposal_received',
      'accepted_action',
      'executed',
    ]);
    expect(
      eventsForAttempt(record({ execution: { status: 'execution_error', detail: 'hidden' } })),
    ).toEqual(['proposal_received', 'accepted_action', 'execution_error', 'retry']);
  });
});

describe('replayStepTransitions', () => {
  it('should fold attempts and the outcome entry into one sequence', () => {
    const transitions = replayStepTransitions(
      [
        record({ execution: { status: 'execution_error', detail: 'hidden' } }),
        record({ attempt: 2, proposal: { action: 'done' } }),
      ],
      {
        kind: 'step_outcome',
        stepIndex: 0,
        outcome: { status: 'completed' },
        transitions: [],
        timestamp: '2026-01-01T00:00:00.000Z',
      },
    );

    expect(transitions.map((t) => t.event)).toEqual([
      'proposal_received',
      'accepted_action',
      'execution_error',
      'retry',
      'proposal_received',
      'accepted_done',
    ]);
    expect(transitions.at(-1)?.to).toBe('StepDone');
  });

  it('should reject a trace that continues past a terminal attempt', () => {
    expect(() =>
      replayStepTransitions([
        record({ proposal: { action: 'done' } }),
        record({ attempt: 2 }),
      ]),
    ).toThrow(InvalidTransitionError);
  });
});
