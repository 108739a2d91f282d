#!/usr/bin/env node

/**
 * visionpilot CLI entry point.
 * Thin wrapper; all logic lives in core.
 */

import 'dotenv/config';
import { Command } from 'commander';

import { registerRunCommand } from './run.js';

const program = new Command();

program
  .name('visionpilot')
  .description(
    'Drive a browser toward a natural-language goal. A vision model proposes one action at a time; guardrails validate it before Playwright runs it.',
  )
  .version('0.1.0');

registerRunCommand(program);

await program.parseAsync();
