import type {
  AttemptRecord,
  Plan,
  RunResult,
  TraceEntry,
  ExecutionResult,
  ValidationResult,
  JsonOutput,
  JsonOutputAttempt,
  JsonOutputStep,
} from '../schema/index.js';
import { JSON_OUTPUT_VERSION, describeAction } from '../schema/index.js';

// ── Run report ───────────────────────────────────────────────

export interface RunReport {
  runId: string;
  intent: string;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
  plan: Plan;
  result: RunResult;
  trace: readonly TraceEntry[];
  tracePath: string;
}

export function exitCodeFor(result: RunResult): number {
  return result.status.kind === 'succeeded' ? 0 : 1;
}

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(report: RunReport): JsonOutput {
  const { status } = report.result;

  return {
    version: JSON_OUTPUT_VERSION,
    runId: report.runId,
    intent: report.intent,
    status: status.kind,
    abortedAtStep: status.kind === 'aborted' ? status.atStep : null,
    reason: status.kind === 'aborted' ? status.reason : null,
    durationMs: report.durationMs,
    exitCode: exitCodeFor(report.result),
    tracePath: report.tracePath,
    steps: report.plan.steps.map((step, index): JsonOutputStep => {
      const outcome = report.result.steps[index];
      return {
        index,
        description: step.description,
        lockedValues: { ...step.lockedValues },
        outcome: outcome?.status ?? 'not_run',
        reason: outcome?.status === 'failed' ? outcome.reason : null,
        attempts: attemptsFor(report.trace, index).map(attemptToJSON),
      };
    }),
  };
}

function attemptToJSON(record: AttemptRecord): JsonOutputAttempt {
  return {
    attempt: record.attempt,
    action: record.proposal !== null ? describeAction(record.proposal) : null,
    validation: formatValidation(record.validation),
    execution: formatExecution(record.execution),
    screenRef: record.screenRef,
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return value;
  }
  return Object.fromEntries(
    Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  );
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(report: RunReport): string {
  const lines: string[] = [];
  const { status } = report.result;

  // Header + metadata
  lines.push(`# visionpilot Run Report`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Intent** | ${escapeMarkdownCell(report.intent)} |`);
  lines.push(`| **Run ID** | \`${report.runId}\` |`);
  lines.push(`| **Started** | ${report.startedAt} |`);
  lines.push(`| **Finished** | ${report.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(report.durationMs)} |`);
  lines.push(`| **Result** | ${formatStatus(report.result)} |`);
  lines.push(`| **Trace** | \`${report.tracePath}\` |`);
  lines.push('');

  // Step summary table
  lines.push(`## Steps`);
  lines.push('');
  lines.push(`| # | Description | Outcome | Attempts | Reason |`);
  lines.push(`|---|-------------|---------|----------|--------|`);

  report.plan.steps.forEach((step, index) => {
    const outcome = report.result.steps[index];
    const label = outcome === undefined ? 'NOT RUN' : outcome.status === 'completed' ? 'COMPLETED' : 'FAILED';
    const reason = outcome?.status === 'failed' ? escapeMarkdownCell(outcome.reason) : '';
    const attempts = attemptsFor(report.trace, index).length;
    lines.push(
      `| ${String(index)} | ${escapeMarkdownCell(step.description)} | ${label} | ${String(attempts)} | ${reason} |`,
    );
  });

  lines.push('');

  // Per-step attempt details
  lines.push(`## Attempts`);
  lines.push('');

  report.plan.steps.forEach((step, index) => {
    const attempts = attemptsFor(report.trace, index);
    if (attempts.length === 0) return;

    lines.push(`### Step ${String(index)}: ${step.description}`);
    lines.push('');

    const locked = Object.entries(step.lockedValues);
    if (locked.length > 0) {
      lines.push(`**Locked values:** ${locked.map(([k, v]) => `\`${k}=${v}\``).join(', ')}`);
      lines.push('');
    }

    lines.push(`| Attempt | Action | Validation | Execution | Screen |`);
    lines.push(`|---------|--------|------------|-----------|--------|`);
    for (const record of attempts) {
      const action = record.proposal !== null ? describeAction(record.proposal) : '-';
      lines.push(
        `| ${String(record.attempt)} | ${escapeMarkdownCell(action)} | ${escapeMarkdownCell(formatValidation(record.validation))} | ${escapeMarkdownCell(formatExecution(record.execution))} | ${record.screenRef ?? '-'} |`,
      );
    }
    lines.push('');
  });

  if (status.kind === 'aborted') {
    lines.push(`## Abort`);
    lines.push('');
    lines.push(`Stopped at step ${String(status.atStep)}: ${status.reason}`);
    lines.push('');
  }

  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

export function attemptsFor(
  trace: readonly TraceEntry[],
  stepIndex: number,
): AttemptRecord[] {
  const records: AttemptRecord[] = [];
  for (const entry of trace) {
    if (entry.kind === 'attempt' && entry.record.stepIndex === stepIndex) {
      records.push(entry.record);
    }
  }
  return records;
}

export function formatStatus(result: RunResult): string {
  return result.status.kind === 'succeeded'
    ? 'SUCCEEDED'
    : `ABORTED at step ${String(result.status.atStep)} (${result.status.reason})`;
}

function formatValidation(validation: ValidationResult | null): string {
  if (validation === null) return 'not validated';
  return validation.status === 'accepted'
    ? 'accepted'
    : `${validation.kind}: ${validation.reason}`;
}

function formatExecution(execution: ExecutionResult): string {
  switch (execution.status) {
    case 'executed':
      return 'executed';
    case 'execution_error':
      return `error: ${execution.detail}`;
    case 'not_dispatched':
      return 'not dispatched';
  }
}

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
