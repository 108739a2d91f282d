import type {
  AttemptRecord,
  StepOutcome,
  StepOutcomeEntry,
  TraceEntry,
  Transition,
} from '../schema/index.js';

// ── Sink interface ───────────────────────────────────────────

/** Durable destination for trace entries. Persistence format is the sink's concern. */
export interface TraceSink {
  write(entry: TraceEntry): Promise<void>;
}

// ── Error ────────────────────────────────────────────────────

export class TraceOrderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TraceOrderError';
  }
}

// ── Freezing ─────────────────────────────────────────────────

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

// ── Recorder ─────────────────────────────────────────────────

/**
 * Append-only store of attempt records and step outcomes.
 *
 * `recordAttempt` resolves only after the sink has written the entry, so
 * callers that await it never move on past an unrecorded attempt. Entries
 * are deep-frozen copies; nothing handed out can be mutated.
 */
export class TraceRecorder {
  private readonly log: TraceEntry[] = [];
  private readonly attempts = new Map<number, AttemptRecord[]>();
  private readonly outcomes = new Map<number, StepOutcomeEntry>();
  private readonly sinks: readonly TraceSink[];

  constructor(sinks: readonly TraceSink[] = []) {
    this.sinks = sinks;
  }

  async recordAttempt(record: AttemptRecord): Promise<AttemptRecord> {
    const stepAttempts = this.attempts.get(record.stepIndex) ?? [];
    const expected = stepAttempts.length + 1;

    if (this.outcomes.has(record.stepIndex)) {
      throw new TraceOrderError(
        `Step ${String(record.stepIndex)} already has an outcome; attempt ${String(record.attempt)} rejected`,
      );
    }
    if (record.attempt !== expected) {
      throw new TraceOrderError(
        `Step ${String(record.stepIndex)}: expected attempt ${String(expected)}, got ${String(record.attempt)}`,
      );
    }

    const frozen = deepFreeze(structuredClone(record));
    await this.append({ kind: 'attempt', record: frozen });

    stepAttempts.push(frozen);
    this.attempts.set(record.stepIndex, stepAttempts);
    return frozen;
  }

  async recordStepOutcome(
    stepIndex: number,
    outcome: StepOutcome,
    transitions: readonly Transition[],
    timestamp: string,
  ): Promise<StepOutcomeEntry> {
    if (this.outcomes.has(stepIndex)) {
      throw new TraceOrderError(`Step ${String(stepIndex)} already has an outcome`);
    }

    const entry: StepOutcomeEntry = deepFreeze({
      kind: 'step_outcome',
      stepIndex,
      outcome: structuredClone(outcome),
      transitions: structuredClone([...transitions]),
      timestamp,
    });
    await this.append(entry);

    this.outcomes.set(stepIndex, entry);
    return entry;
  }

  // ── Read path ──────────────────────────────────────────────

  getAttempt(stepIndex: number, attempt: number): AttemptRecord | undefined {
    return this.attempts.get(stepIndex)?.[attempt - 1];
  }

  attemptsForStep(stepIndex: number): readonly AttemptRecord[] {
    return [...(this.attempts.get(stepIndex) ?? [])];
  }

  outcomeForStep(stepIndex: number): StepOutcomeEntry | undefined {
    return this.outcomes.get(stepIndex);
  }

  entries(): readonly TraceEntry[] {
    return [...this.log];
  }

  // ── Internals ──────────────────────────────────────────────

  private async append(entry: TraceEntry): Promise<void> {
    for (const sink of this.sinks) {
      await sink.write(entry);
    }
    this.log.push(entry);
  }
}
