/**
 * Default configuration values.
 * Overridable via config file or CLI flags where noted.
 */

export const TIMEOUTS = {
  /** Bound on one VLM proposal call. Overridable. */
  VLM_TIMEOUT: 30_000,
  /** Bound on one screen capture or browser action. Overridable. */
  ACTION_TIMEOUT: 30_000,
  NAVIGATION_TIMEOUT: 15_000,
  PLANNER_TIMEOUT: 60_000,
} as const;

export const LIMITS = {
  /** Attempts per step before `max_retries_exceeded`. Overridable. */
  MAX_ATTEMPTS: 3,
  MAX_PLAN_STEPS: 20,
  MAX_LLM_RETRIES: 3,
  MAX_TEXT_LENGTH: 500,
  MAX_FIELD_REF_LENGTH: 200,
  MAX_SCROLL_PIXELS: 5_000,
  MAX_WAIT_MS: 10_000,
} as const;

export const VIEWPORT = {
  WIDTH: 1024,
  HEIGHT: 768,
} as const;

export const TOKEN_GUARDS = {
  /** Executed actions echoed back to the model, most recent last. */
  MAX_HISTORY_IN_PROMPT: 5,
  MAX_RAW_RESPONSE_CHARS: 200,
} as const;
