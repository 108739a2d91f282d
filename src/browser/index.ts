/**
 * Browser execution module.
 * Playwright session behind the BrowserCapability interface. No LLM calls.
 * Captures screens and executes validated actions.
 */

export { launchSession, scrollDelta } from './session.js';
export type { SessionConfig, BrowserSession } from './session.js';
export { resolveField, resolveText, FieldNotFoundError } from './locators.js';
