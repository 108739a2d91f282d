/**
 * Vision model module.
 * Turns a screenshot + step + history into one parsed action proposal.
 */

export { createVisionModel, buildStepPrompt, formatHistory, formatLockedValues } from './proposer.js';
