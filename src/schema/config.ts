import { z } from 'zod';

import { LIMITS } from '../config/defaults.js';

// ── Provider block ──────────────────────────────────────────

export const providerConfigSchema = z.object({
  provider: z.enum(['anthropic', 'openai', 'mock']).optional(),
  model: z.string().min(1).optional(),
});

export type ProviderConfig = z.infer<typeof providerConfigSchema>;

// ── Viewport ────────────────────────────────────────────────

export const viewportSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

export type Viewport = z.infer<typeof viewportSchema>;

// ── Full config file ────────────────────────────────────────
// Timeouts are in seconds, like the CLI flags.

export const fileConfigSchema = z
  .object({
    startUrl: z.string().url().optional(),
    headless: z.boolean().optional().default(false),
    maxAttempts: z.number().int().positive().optional().default(LIMITS.MAX_ATTEMPTS),
    vlmTimeout: z.number().positive().optional(),
    actionTimeout: z.number().positive().optional(),
    reportPath: z.string().min(1).optional(),
    viewport: viewportSchema.optional(),
    planner: providerConfigSchema.optional(),
    vlm: providerConfigSchema.optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;
