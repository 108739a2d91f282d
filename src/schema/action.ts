import { z } from 'zod';

import { LIMITS } from '../config/defaults.js';

// ── Action name discriminator ───────────────────────────────

export const actionNameSchema = z.enum([
  'click',
  'click_text',
  'type_text',
  'scroll',
  'wait',
  'navigate',
  'done',
  'fail',
]);

export type ActionName = z.infer<typeof actionNameSchema>;

// Numbers the model emits for text fields ("value": 500) are kept as their
// string form so locked-value comparison is exact on strings.
const boundedTextSchema = z
  .union([z.string(), z.number()])
  .transform((v) => String(v))
  .pipe(z.string().max(LIMITS.MAX_TEXT_LENGTH));

const coordinateSchema = z.number().int();

// ── Individual action schemas ───────────────────────────────

export const clickActionSchema = z
  .object({
    action: z.literal('click'),
    x: coordinateSchema,
    y: coordinateSchema,
  })
  .strict();

export const clickTextActionSchema = z
  .object({
    action: z.literal('click_text'),
    text: z.string().min(1).max(LIMITS.MAX_TEXT_LENGTH),
  })
  .strict();

export const typeTextActionSchema = z
  .object({
    action: z.literal('type_text'),
    fieldRef: z.string().trim().min(1).max(LIMITS.MAX_FIELD_REF_LENGTH),
    value: boundedTextSchema,
  })
  .strict();

export const scrollDirectionSchema = z.enum(['up', 'down', 'left', 'right']);

export type ScrollDirection = z.infer<typeof scrollDirectionSchema>;

export const scrollActionSchema = z
  .object({
    action: z.literal('scroll'),
    direction: scrollDirectionSchema,
    amount: z.number().int().positive().max(LIMITS.MAX_SCROLL_PIXELS),
  })
  .strict();

export const waitActionSchema = z
  .object({
    action: z.literal('wait'),
    ms: z.number().int().positive().max(LIMITS.MAX_WAIT_MS),
  })
  .strict();

export const navigateActionSchema = z
  .object({
    action: z.literal('navigate'),
    url: z.string().url(),
  })
  .strict();

export const doneActionSchema = z
  .object({
    action: z.literal('done'),
    summary: z.string().max(LIMITS.MAX_TEXT_LENGTH).optional(),
  })
  .strict();

export const failActionSchema = z
  .object({
    action: z.literal('fail'),
    reason: z.string().min(1).max(LIMITS.MAX_TEXT_LENGTH),
  })
  .strict();

// ── Union schema ────────────────────────────────────────────

export const actionProposalSchema = z.discriminatedUnion('action', [
  clickActionSchema,
  clickTextActionSchema,
  typeTextActionSchema,
  scrollActionSchema,
  waitActionSchema,
  navigateActionSchema,
  doneActionSchema,
  failActionSchema,
]);

export type ActionProposal = z.infer<typeof actionProposalSchema>;

export type ClickAction = z.infer<typeof clickActionSchema>;
export type ClickTextAction = z.infer<typeof clickTextActionSchema>;
export type TypeTextAction = z.infer<typeof typeTextActionSchema>;
export type ScrollAction = z.infer<typeof scrollActionSchema>;
export type WaitAction = z.infer<typeof waitActionSchema>;
export type NavigateAction = z.infer<typeof navigateActionSchema>;
export type DoneAction = z.infer<typeof doneActionSchema>;
export type FailAction = z.infer<typeof failActionSchema>;

export type TerminalAction = DoneAction | FailAction;

export function isTerminalAction(
  proposal: ActionProposal,
): proposal is TerminalAction {
  return proposal.action === 'done' || proposal.action === 'fail';
}

// ── Parse outcome ───────────────────────────────────────────

export interface SchemaViolation {
  message: string;
  /** Dotted paths of the offending fields; `(root)` for the whole response. */
  fields: string[];
}

export type ProposalOutcome =
  | { ok: true; proposal: ActionProposal }
  | { ok: false; violation: SchemaViolation };

const ROOT_FIELD = '(root)';

// ── Parser ──────────────────────────────────────────────────

/**
 * Parse one raw model response into exactly one ActionProposal.
 *
 * Accepts a bare JSON object, a Markdown-fenced one, or a single-element
 * array. Anything else, including an array of several actions, is a
 * SchemaViolation rather than a silent pick.
 */
export function parseActionProposal(raw: string): ProposalOutcome {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJSON(raw));
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return violation(`Invalid JSON: ${message}`, [ROOT_FIELD]);
  }

  return parseActionValue(parsed);
}

export function parseActionValue(value: unknown): ProposalOutcome {
  let candidate = value;

  if (Array.isArray(candidate)) {
    if (candidate.length !== 1) {
      return violation(
        `Expected exactly one action, got ${String(candidate.length)}`,
        [ROOT_FIELD],
      );
    }
    candidate = candidate[0];
  }

  const result = actionProposalSchema.safeParse(candidate);
  if (!result.success) {
    const fields = result.error.issues.map((issue) =>
      issue.path.length > 0 ? issue.path.join('.') : ROOT_FIELD,
    );
    return violation(result.error.issues.map((i) => i.message).join('; '), [
      ...new Set(fields),
    ]);
  }

  return { ok: true, proposal: result.data };
}

function violation(message: string, fields: string[]): ProposalOutcome {
  return { ok: false, violation: { message, fields } };
}

// ── JSON extraction ─────────────────────────────────────────

export function extractJSON(raw: string): string {
  const fenced = /```(?:json)?\s*\n?([\s\S]*?)```/.exec(raw);
  const body = fenced?.[1] !== undefined ? fenced[1].trim() : raw.trim();

  const open = body.startsWith('[') ? '[' : '{';
  const close = open === '[' ? ']' : '}';
  const start = body.indexOf(open);
  const end = body.lastIndexOf(close);
  if (start !== -1 && end > start) return body.slice(start, end + 1);

  return body;
}

// ── Description helper ──────────────────────────────────────

/** Human-readable one-liner for prompts, logs and reports. */
export function describeAction(proposal: ActionProposal): string {
  switch (proposal.action) {
    case 'click':
      return `click (${String(proposal.x)}, ${String(proposal.y)})`;
    case 'click_text':
      return `click_text "${proposal.text}"`;
    case 'type_text':
      return `type_text ${proposal.fieldRef}="${proposal.value}"`;
    case 'scroll':
      return `scroll ${proposal.direction} ${String(proposal.amount)}px`;
    case 'wait':
      return `wait ${String(proposal.ms)}ms`;
    case 'navigate':
      return `navigate ${proposal.url}`;
    case 'done':
      return proposal.summary ? `done: ${proposal.summary}` : 'done';
    case 'fail':
      return `fail: ${proposal.reason}`;
  }
}
