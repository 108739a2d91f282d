import path from 'node:path';
import { fileURLToPath } from 'node:url';

// ── Template paths ───────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));

/** Prompt templates ship beside src/ and dist/, at the package root. */
export const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');
