/**
 * Report generation module.
 * Deterministic. No LLM calls.
 * Turns a run result and its trace into markdown + JSON artifacts.
 */

export {
  generateMarkdown,
  generateJSON,
  serializeJSON,
  exitCodeFor,
  formatStatus,
  attemptsFor,
} from './reporter.js';
export type { RunReport } from './reporter.js';
