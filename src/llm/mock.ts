import type { LLMClient } from './client.js';

const DEFAULT_RESPONSE = '{"action":"done"}';

/**
 * Mock LLM provider for testing.
 * Cycles through provided canned responses, falling back to a default.
 * Text and image calls share one response queue.
 */
export function createMockClient(
  responses?: readonly string[],
): LLMClient {
  let callIndex = 0;

  const next = async (): Promise<string> => {
    const response = responses?.[callIndex] ?? DEFAULT_RESPONSE;
    callIndex++;
    return response;
  };

  return {
    async generate(
      _systemPrompt: string,
      _userPrompt: string,
    ): Promise<string> {
      return next();
    },

    async generateWithImage(
      _systemPrompt: string,
      _userPrompt: string,
      _imageBase64: string,
      _mimeType: string,
    ): Promise<string> {
      return next();
    },
  };
}
