/**
 * Model access for the planner and the vision model.
 * Nothing outside this module calls a provider API.
 */

import type { LLMClient, LLMConfig } from './client.js';
import { createAnthropicClient } from './anthropic.js';
import { createOpenAIClient } from './openai.js';
import { createMockClient } from './mock.js';

export * from './client.js';
export { createAnthropicClient } from './anthropic.js';
export { createOpenAIClient } from './openai.js';
export { createMockClient } from './mock.js';

// ── Provider factory ─────────────────────────────────────────

const KEY_VARIABLES = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
} as const;

function requireKey(config: LLMConfig, provider: keyof typeof KEY_VARIABLES): string {
  if (config.apiKey === undefined) {
    throw new Error(
      `${KEY_VARIABLES[provider]} is required when using the ${provider} provider`,
    );
  }
  return config.apiKey;
}

export function createLLMClient(config: LLMConfig): LLMClient {
  switch (config.provider) {
    case 'anthropic':
      return createAnthropicClient(requireKey(config, 'anthropic'), config.model);
    case 'openai':
      return createOpenAIClient(requireKey(config, 'openai'), config.model, config.baseUrl);
    case 'mock':
      return createMockClient();
  }
}
