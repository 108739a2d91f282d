import { readFile } from 'node:fs/promises';
import path from 'node:path';

import type { LLMClient, ImageMimeType } from '../llm/index.js';
import type { ActionProposal, PlanStep, ProposalOutcome } from '../schema/index.js';
import { actionNameSchema, describeAction, parseActionProposal } from '../schema/index.js';
import { TOKEN_GUARDS } from '../config/defaults.js';
import { PROMPTS_DIR } from '../config/paths.js';
import type { ProposalRequest, VisionModel } from '../core/collaborators.js';
import * as log from '../utils/logger.js';

// ── History formatting ──────────────────────────────────────

export function formatHistory(history: readonly ActionProposal[]): string {
  if (history.length === 0) return '(no actions taken yet)';

  const recent = history.slice(-TOKEN_GUARDS.MAX_HISTORY_IN_PROMPT);
  const offset = history.length - recent.length;

  return recent
    .map((proposal, i) => `${String(offset + i + 1)}. ${describeAction(proposal)}`)
    .join('\n');
}

export function formatLockedValues(lockedValues: PlanStep['lockedValues']): string {
  const entries = Object.entries(lockedValues);
  if (entries.length === 0) return '(none)';
  return entries.map(([key, value]) => `- ${key}: ${value}`).join('\n');
}

// ── Prompt building ─────────────────────────────────────────

export async function buildStepPrompt(request: ProposalRequest): Promise<string> {
  const template = await readFile(path.join(PROMPTS_DIR, 'vlm_step.txt'), 'utf-8');
  const allowed = request.step.allowedActions ?? actionNameSchema.options;

  // Replacer functions keep `$` sequences in values literal.
  return template
    .replace('{{step}}', () => request.step.description)
    .replaceAll('{{width}}', () => String(request.screen.width))
    .replaceAll('{{height}}', () => String(request.screen.height))
    .replace('{{lockedValues}}', () => formatLockedValues(request.step.lockedValues))
    .replace('{{allowedActions}}', () => [...allowed, 'done', 'fail'].filter(unique).join(', '))
    .replace('{{history}}', () => formatHistory(request.history));
}

function unique<T>(value: T, index: number, all: readonly T[]): boolean {
  return all.indexOf(value) === index;
}

// ── Image loading ───────────────────────────────────────────

const MIME_BY_EXTENSION: Readonly<Record<string, ImageMimeType>> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp',
  '.gif': 'image/gif',
};

function mimeTypeFor(imageRef: string): ImageMimeType {
  return MIME_BY_EXTENSION[path.extname(imageRef).toLowerCase()] ?? 'image/png';
}

// ── Vision model ────────────────────────────────────────────

/**
 * VisionModel backed by a multimodal LLM client.
 * The raw reply is untrusted and goes through the action schema; a
 * malformed reply comes back as a SchemaViolation, not an exception.
 */
export function createVisionModel(client: LLMClient): VisionModel {
  return {
    async proposeAction(request: ProposalRequest): Promise<ProposalOutcome> {
      const prompt = await buildStepPrompt(request);
      const image = await readFile(request.screen.imageRef);

      log.llm('VLM choosing next action...');
      const raw = await client.generateWithImage(
        prompt,
        request.step.description,
        image.toString('base64'),
        mimeTypeFor(request.screen.imageRef),
      );

      const outcome = parseActionProposal(raw);
      if (!outcome.ok) {
        log.detail(`Unparseable reply: ${raw.slice(0, TOKEN_GUARDS.MAX_RAW_RESPONSE_CHARS)}`);
      }
      return outcome;
    },
  };
}
