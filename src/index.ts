/**
 * visionpilot public API.
 * The CLI in src/cli is one consumer; embedders wire their own collaborators.
 */

export * from './schema/index.js';
export * from './core/index.js';
export * from './trace/index.js';
export * from './report/index.js';
export { createVisionModel } from './vlm/index.js';
export { launchSession } from './browser/index.js';
export type { BrowserSession, SessionConfig } from './browser/index.js';
export { createLLMClient, loadLLMConfig, createMockClient } from './llm/index.js';
export type { LLMClient, LLMConfig, LLMRole, ImageMimeType } from './llm/index.js';
export { TimeoutError, withTimeout } from './utils/timeout.js';
