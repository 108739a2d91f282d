import { z } from 'zod';

import { actionProposalSchema } from './action.js';

// ── ScreenState ─────────────────────────────────────────────

export const screenStateSchema = z.object({
  imageRef: z.string().min(1),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  capturedAt: z.string().datetime(),
});

export type ScreenState = z.infer<typeof screenStateSchema>;

// ── Validation result ───────────────────────────────────────

export const rejectionKindSchema = z.enum([
  'SchemaViolation',
  'OutOfBoundsAction',
  'LockViolation',
  'ActionNotAllowed',
  'ProposalError',
]);

export type RejectionKind = z.infer<typeof rejectionKindSchema>;

export const validationResultSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('accepted') }),
  z.object({
    status: z.literal('rejected'),
    kind: rejectionKindSchema,
    reason: z.string(),
    fields: z.array(z.string()).optional(),
  }),
]);

export type ValidationResult = z.infer<typeof validationResultSchema>;
export type Rejection = Extract<ValidationResult, { status: 'rejected' }>;

// ── Execution result ────────────────────────────────────────

export const executionResultSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('executed') }),
  z.object({ status: z.literal('execution_error'), detail: z.string() }),
  z.object({ status: z.literal('not_dispatched') }),
]);

export type ExecutionResult = z.infer<typeof executionResultSchema>;

// ── Executor states and events ──────────────────────────────

export const executorStateSchema = z.enum([
  'AwaitingProposal',
  'Validating',
  'Executing',
  'Retrying',
  'StepDone',
  'StepFailed',
  // Reserved for a confirmation gate before irreversible actions.
  // Nothing transitions into it yet.
  'AwaitingConfirmation',
]);

export type ExecutorState = z.infer<typeof executorStateSchema>;

export const executorEventSchema = z.enum([
  'capture_failed',
  'proposal_failed',
  'proposal_received',
  'rejected',
  'accepted_action',
  'accepted_done',
  'accepted_fail',
  'executed',
  'execution_error',
  'retry',
  'budget_exhausted',
  'cancelled',
]);

export type ExecutorEvent = z.infer<typeof executorEventSchema>;

export const transitionSchema = z.object({
  from: executorStateSchema,
  event: executorEventSchema,
  to: executorStateSchema,
});

export type Transition = z.infer<typeof transitionSchema>;

// ── AttemptRecord ───────────────────────────────────────────

export const attemptRecordSchema = z.object({
  stepIndex: z.number().int().nonnegative(),
  attempt: z.number().int().positive(),
  screenRef: z.string().nullable(),
  proposal: actionProposalSchema.nullable(),
  validation: validationResultSchema.nullable(),
  execution: executionResultSchema,
  transitions: z.array(transitionSchema),
  timestamp: z.string().datetime(),
});

export type AttemptRecord = z.infer<typeof attemptRecordSchema>;

// ── Step outcome ────────────────────────────────────────────

export const MAX_RETRIES_EXCEEDED = 'max_retries_exceeded';
export const RUN_CANCELLED = 'run_cancelled';

export const stepOutcomeSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('completed') }),
  z.object({ status: z.literal('failed'), reason: z.string().min(1) }),
]);

export type StepOutcome = z.infer<typeof stepOutcomeSchema>;

// ── Trace entries (what the sink persists) ──────────────────

export const traceEntrySchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('attempt'), record: attemptRecordSchema }),
  z.object({
    kind: z.literal('step_outcome'),
    stepIndex: z.number().int().nonnegative(),
    outcome: stepOutcomeSchema,
    transitions: z.array(transitionSchema),
    timestamp: z.string().datetime(),
  }),
]);

export type TraceEntry = z.infer<typeof traceEntrySchema>;
export type StepOutcomeEntry = Extract<TraceEntry, { kind: 'step_outcome' }>;

// ── RunResult ───────────────────────────────────────────────

export const runStatusSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('succeeded') }),
  z.object({
    kind: z.literal('aborted'),
    atStep: z.number().int().nonnegative(),
    reason: z.string().min(1),
  }),
]);

export type RunStatus = z.infer<typeof runStatusSchema>;

export const runResultSchema = z.object({
  status: runStatusSchema,
  steps: z.array(stepOutcomeSchema),
});

export type RunResult = z.infer<typeof runResultSchema>;

// ── Validators ──────────────────────────────────────────────

export function parseTraceEntry(data: unknown): TraceEntry {
  return traceEntrySchema.parse(data);
}
