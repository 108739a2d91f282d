import { describe, it, expect } from 'vitest';
import {
  attemptsFor,
  exitCodeFor,
  formatStatus,
  generateJSON,
  generateMarkdown,
  serializeJSON,
} from '../reporter.js';
import type { RunReport } from '../reporter.js';
import { createPlan } from '../../schema/plan.js';
import type { TraceEntry } from '../../schema/trace.js';

const TIMESTAMP = '2026-01-01T00:00:00.000Z';

const TRACE: TraceEntry[] = [
  {
    kind: 'attempt',
    record: {
      stepIndex: 0,
      attempt: 1,
      screenRef: 's0.png',
      proposal: { action: 'done' },
      validation: { status: 'accepted' },
      execution: { status: 'not_dispatched' },
      transitions: [],
      timestamp: TIMESTAMP,
    },
  },
  {
    kind: 'step_outcome',
    stepIndex: 0,
    outcome: { status: 'completed' },
    transitions: [],
    timestamp: TIMESTAMP,
  },
  {
    kind: 'attempt',
    record: {
      stepIndex: 1,
      attempt: 1,
      screenRef: 's1.png',
      proposal: { action: 'type_text', fieldRef: 'amount', value: '1000' },
      validation: { status: 'rejected', kind: 'LockViolation', reason: 'locked' },
      execution: { status: 'not_dispatched' },
      transitions: [],
      timestamp: TIMESTAMP,
    },
  },
];

function abortedReport(): RunReport {
  return {
    runId: 'run-1',
    intent: 'Send 500 Rs to Rohit',
    startedAt: TIMESTAMP,
    finishedAt: '2026-01-01T00:00:01.500Z',
    durationMs: 1500,
    plan: createPlan([
      { description: 'Open the payments page' },
      { description: 'Enter the amount', lockedValues: { amount: 500 } },
      { description: 'Confirm | pay' },
    ]),
    result: {
      status: { kind: 'aborted', atStep: 1, reason: 'max_retries_exceeded' },
      steps: [{ status: 'completed' }, { status: 'failed', reason: 'max_retries_exceeded' }],
    },
    trace: TRACE,
    tracePath: '/tmp/run-1/trace.jsonl',
  };
}

describe('exitCodeFor and formatStatus', () => {
  it('should map run status to exit code and label', () => {
    const succeeded = { status: { kind: 'succeeded' as const }, steps: [] };
    expect(exitCodeFor(succeeded)).toBe(0);
    expect(formatStatus(succeeded)).toBe('SUCCEEDED');
    expect(exitCodeFor(abortedReport().result)).toBe(1);
    expect(formatStatus(abortedReport().result)).toBe('ABORTED at step 1 (max_retries_exceeded)');
  });
});

describe('attemptsFor', () => {
  it('should pick the attempt records of one step', () => {
    expect(attemptsFor(TRACE, 1).map((r) => r.screenRef)).toEqual(['s1.png']);
    expect(attemptsFor(TRACE, 2)).toEqual([]);
  });
});

describe('generateJSON', () => {
  it('should describe every planned step, including ones never run', () => {
    expect(generateJSON(abortedReport())).toEqual({
      version: '1.0',
      runId: 'run-1',
      intent: 'Send 500 Rs to Rohit',
      status: 'aborted',
      abortedAtStep: 1,
      reason: 'max_retries_exceeded',
      durationMs: 1500,
      exitCode: 1,
      tracePath: '/tmp/run-1/trace.jsonl',
      steps: [
        {
          index: 0,
          description: 'Open the payments page',
          lockedValues: {},
          outcome: 'completed',
          reason: null,
          attempts: [
            {
              attempt: 1,
              action: 'done',
              validation: 'accepted',
              execution: 'not dispatched',
              screenRef: 's0.png',
            },
          ],
        },
        {
          index: 1,
          description: 'Enter the amount',
          lockedValues: { amount: '500' },
          outcome: 'failed',
          reason: 'max_retries_exceeded',
          attempts: [
            {
              attempt: 1,
              action: 'type_text amount="1000"',
              validation: 'LockViolation: locked',
              execution: 'not dispatched',
              screenRef: 's1.png',
            },
          ],
        },
        {
          index: 2,
          description: 'Confirm | pay',
          lockedValues: {},
          outcome: 'not_run',
          reason: null,
          attempts: [],
        },
      ],
    });
  });

  it('should serialize with sorted keys', () => {
    const parsed: unknown = JSON.parse(serializeJSON(generateJSON(abortedReport())));
    expect(Object.keys(parsed !== null && typeof parsed === 'object' ? parsed : {})).toEqual([
      'abortedAtStep',
      'durationMs',
      'exitCode',
      'intent',
      'reason',
      'runId',
      'status',
      'steps',
      'tracePath',
      'version',
    ]);
  });
});

describe('generateMarkdown', () => {
  it('should render the summary, attempts and abort reason', () => {
    const lines = generateMarkdown(abortedReport()).split('\n');

    expect(lines[0]).toBe('# visionpilot Run Report');
    expect(lines).toContain('| **Duration** | 1.5s |');
    expect(lines).toContain('| **Result** | ABORTED at step 1 (max_retries_exceeded) |');
    expect(lines).toContain('| 1 | Enter the amount | FAILED | 1 | max_retries_exceeded |');
    expect(lines).toContain('| 2 | Confirm \\| pay | NOT RUN | 0 |  |');
    expect(lines).toContain('**Locked values:** `amount=500`');
    expect(lines).toContain(
      '| 1 | type_text amount="1000" | LockViolation: locked | not dispatched | s1.png |',
    );
    expect(lines).toContain('Stopped at step 1: max_retries_exceeded');
    expect(lines).not.toContain('### Step 2: Confirm | pay');
  });
});
