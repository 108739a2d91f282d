import type { Locator, Page } from 'playwright-core';

// ── Error ─────────────────────────────────────────────────────

export class FieldNotFoundError extends Error {
  readonly fieldRef: string;

  constructor(fieldRef: string) {
    super(`No input field matches "${fieldRef}" by label, placeholder or name`);
    this.name = 'FieldNotFoundError';
    this.fieldRef = fieldRef;
  }
}

// ── Resolver ──────────────────────────────────────────────────

/**
 * Maps a field reference from the VLM to a Playwright Locator.
 *
 * A reference matches, in this order of preference:
 *   1. accessible label  → page.getByLabel(ref)
 *   2. placeholder text  → page.getByPlaceholder(ref)
 *   3. name attribute    → [name="ref"]
 *
 * Only the first match is used; an ambiguous label never fans out
 * into typing into several fields.
 */
export async function resolveField(page: Page, fieldRef: string): Promise<Locator> {
  const candidates: Locator[] = [
    page.getByLabel(fieldRef, { exact: true }),
    page.getByPlaceholder(fieldRef, { exact: true }),
    page.locator(`[name="${escapeAttribute(fieldRef)}"]`),
    page.getByLabel(fieldRef),
    page.getByPlaceholder(fieldRef),
  ];

  for (const candidate of candidates) {
    if ((await candidate.count()) > 0) return candidate.first();
  }

  throw new FieldNotFoundError(fieldRef);
}

/** First element whose text contains `text`. */
export function resolveText(page: Page, text: string): Locator {
  return page.getByText(text, { exact: false }).first();
}

function escapeAttribute(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}
