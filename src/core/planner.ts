import { readFile } from 'node:fs/promises';
import path from 'node:path';

import type { LLMClient } from '../llm/index.js';
import type { Plan } from '../schema/index.js';
import { PROMPTS_DIR } from '../config/paths.js';
import { extractJSON, parsePlan } from '../schema/index.js';
import { errorMessage } from '../utils/timeout.js';
import * as log from '../utils/logger.js';
import type { Planner } from './collaborators.js';

// ── Error ────────────────────────────────────────────────────

export class PlanningError extends Error {
  readonly exitCode = 3;

  constructor(message: string) {
    super(message);
    this.name = 'PlanningError';
  }
}

// ── Pre-validation fixups ────────────────────────────────────
// Older prompts asked for snake_case keys and models still produce
// them now and then. Rename before Zod validation.

const KEY_ALIASES: Readonly<Record<string, string>> = {
  locked_values: 'lockedValues',
  expected_actions: 'allowedActions',
  allowed_actions: 'allowedActions',
};

function fixupRawPlan(parsed: unknown): unknown {
  const steps: unknown = Array.isArray(parsed)
    ? parsed
    : typeof parsed === 'object' && parsed !== null && 'steps' in parsed
      ? parsed.steps
      : undefined;

  if (!Array.isArray(steps)) return parsed;

  return {
    steps: steps.map((step: unknown) => {
      if (typeof step !== 'object' || step === null) return step;
      const renamed: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(step)) {
        renamed[KEY_ALIASES[key] ?? key] = value;
      }
      return renamed;
    }),
  };
}

// ── Main entry ───────────────────────────────────────────────

export async function producePlan(
  client: LLMClient,
  intent: string,
): Promise<Plan> {
  log.llm('Planner generating steps...');
  const systemPrompt = await buildSystemPrompt();

  const raw = await callModel(client, systemPrompt, intent);

  const firstAttempt = tryParse(raw);
  if (firstAttempt.ok) {
    logPlannedSteps(firstAttempt.plan);
    return firstAttempt.plan;
  }

  // Repair: one retry with the repair prompt
  log.warn(`Planner parse failed, attempting repair: ${firstAttempt.error}`);
  const repairPrompt = await buildRepairPrompt(raw, firstAttempt.error);
  const repaired = await callModel(client, systemPrompt, repairPrompt);

  const secondAttempt = tryParse(repaired);
  if (secondAttempt.ok) {
    logPlannedSteps(secondAttempt.plan);
    return secondAttempt.plan;
  }

  throw new PlanningError(
    `Planner failed after repair attempt: ${secondAttempt.error}`,
  );
}

/** Planner collaborator backed by an LLM client. */
export function createLLMPlanner(client: LLMClient): Planner {
  return {
    producePlan: (intent: string) => producePlan(client, intent),
  };
}

async function callModel(
  client: LLMClient,
  systemPrompt: string,
  userPrompt: string,
): Promise<string> {
  try {
    return await client.generate(systemPrompt, userPrompt);
  } catch (err) {
    throw new PlanningError(`Planner LLM call failed: ${errorMessage(err)}`);
  }
}

function logPlannedSteps(plan: Plan): void {
  log.planned(plan.steps.length);
  plan.steps.forEach((step, i) => {
    const locked = Object.entries(step.lockedValues)
      .map(([key, value]) => `${key}=${value}`)
      .join(', ');
    log.detail(
      `${String(i + 1)}. ${step.description}${locked ? ` [locked: ${locked}]` : ''}`,
    );
  });
}

// ── Template rendering ───────────────────────────────────────

async function buildSystemPrompt(): Promise<string> {
  return readFile(path.join(PROMPTS_DIR, 'planner.txt'), 'utf-8');
}

async function buildRepairPrompt(
  previousOutput: string,
  error: string,
): Promise<string> {
  const template = await readFile(
    path.join(PROMPTS_DIR, 'planner_repair.txt'),
    'utf-8',
  );

  return template
    .replace('{{error}}', () => error)
    .replace('{{previousOutput}}', () => previousOutput);
}

// ── JSON extraction + validation ─────────────────────────────

type ParseResult =
  | { ok: true; plan: Plan }
  | { ok: false; error: string };

function tryParse(raw: string): ParseResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(extractJSON(raw));
  } catch (e) {
    return { ok: false, error: `Invalid JSON: ${errorMessage(e)}` };
  }

  try {
    return { ok: true, plan: parsePlan(fixupRawPlan(parsed)) };
  } catch (e) {
    return { ok: false, error: errorMessage(e) };
  }
}
