import { z } from 'zod';

// ── LLMClient interface ──────────────────────────────────────

export type ImageMimeType = 'image/png' | 'image/jpeg' | 'image/gif' | 'image/webp';

export interface LLMClient {
  generate(systemPrompt: string, userPrompt: string): Promise<string>;
  generateWithImage(
    systemPrompt: string,
    userPrompt: string,
    imageBase64: string,
    mimeType: ImageMimeType,
  ): Promise<string>;
}

// ── Config schema ────────────────────────────────────────────

export const llmProviderSchema = z.enum(['anthropic', 'openai', 'mock']);

export type LLMProvider = z.infer<typeof llmProviderSchema>;

export const llmConfigSchema = z.object({
  provider: llmProviderSchema,
  apiKey: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  baseUrl: z.string().url().optional(),
});

export type LLMConfig = z.infer<typeof llmConfigSchema>;

/** Planner and VLM may run on different providers and models. */
export type LLMRole = 'planner' | 'vlm';

// ── Env loader ───────────────────────────────────────────────

export function loadLLMConfig(
  role: LLMRole,
  env: NodeJS.ProcessEnv = process.env,
): LLMConfig {
  const prefix = role === 'planner' ? 'PLANNER' : 'VLM';
  const provider = env[`${prefix}_PROVIDER`] ?? env['LLM_PROVIDER'] ?? 'anthropic';

  const apiKey = provider === 'anthropic'
    ? env['ANTHROPIC_API_KEY']
    : env['OPENAI_API_KEY'];

  const baseUrl = provider === 'openai' ? env['OPENAI_BASE_URL'] : undefined;

  return llmConfigSchema.parse({
    provider,
    apiKey,
    model: env[`${prefix}_MODEL`],
    baseUrl,
  });
}
