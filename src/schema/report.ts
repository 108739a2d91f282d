import { z } from 'zod';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Attempt output ──────────────────────────────────────────

export const jsonOutputAttemptSchema = z.object({
  attempt: z.number().int().positive(),
  action: z.string().nullable(),
  validation: z.string(),
  execution: z.string(),
  screenRef: z.string().nullable(),
});

export type JsonOutputAttempt = z.infer<typeof jsonOutputAttemptSchema>;

// ── Step output ─────────────────────────────────────────────

export const jsonOutputStepSchema = z.object({
  index: z.number().int().nonnegative(),
  description: z.string(),
  lockedValues: z.record(z.string()),
  outcome: z.enum(['completed', 'failed', 'not_run']),
  reason: z.string().nullable(),
  attempts: z.array(jsonOutputAttemptSchema),
});

export type JsonOutputStep = z.infer<typeof jsonOutputStepSchema>;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  runId: z.string().min(1),
  intent: z.string(),
  status: z.enum(['succeeded', 'aborted']),
  abortedAtStep: z.number().int().nonnegative().nullable(),
  reason: z.string().nullable(),
  durationMs: z.number().int().nonnegative(),
  exitCode: z.number().int().nonnegative(),
  tracePath: z.string(),
  steps: z.array(jsonOutputStepSchema),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
