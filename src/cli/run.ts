import { randomUUID } from 'node:crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { Command } from 'commander';

import type { FileConfig, ProviderConfig } from '../schema/index.js';
import { createLLMClient, loadLLMConfig } from '../llm/index.js';
import type { LLMConfig, LLMRole } from '../llm/index.js';
import { createLLMPlanner, runIntent, PlanningError } from '../core/index.js';
import type { RunDeps } from '../core/index.js';
import { createVisionModel } from '../vlm/index.js';
import { launchSession } from '../browser/index.js';
import type { BrowserSession } from '../browser/index.js';
import { TraceRecorder, JsonlTraceSink } from '../trace/index.js';
import type { RunReport } from '../report/index.js';
import {
  exitCodeFor,
  formatStatus,
  generateJSON,
  generateMarkdown,
  serializeJSON,
} from '../report/index.js';
import { DEFAULT_CONFIG_PATH, LIMITS, TIMEOUTS, loadOptionalConfigFile } from '../config/index.js';
import { errorMessage } from '../utils/timeout.js';
import * as log from '../utils/logger.js';

// ── Exit codes ───────────────────────────────────────────────

const EXIT_CONFIG_ERROR = 4;

// ── Option parsing ───────────────────────────────────────────

export interface RunFlags {
  startUrl?: string;
  headless?: true;
  maxAttempts?: string;
  vlmTimeout?: string;
  actionTimeout?: string;
  reportPath?: string;
  config: string;
  browserPath?: string;
  json?: true;
}

export interface ResolvedRunOptions {
  startUrl: string | undefined;
  headless: boolean;
  maxAttempts: number;
  vlmTimeoutMs: number;
  actionTimeoutMs: number;
  reportPath: string;
  viewport: FileConfig['viewport'];
  browserPath: string | undefined;
}

function parsePositive(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`${flag} must be a positive number, got "${value}"`);
  }
  return n;
}

/** CLI flags override the config file; the file overrides defaults. */
export function resolveRunOptions(
  flags: RunFlags,
  fileConfig: FileConfig,
  env: NodeJS.ProcessEnv = process.env,
): ResolvedRunOptions {
  const maxAttempts = parsePositive(flags.maxAttempts, '--max-attempts');
  if (maxAttempts !== undefined && !Number.isInteger(maxAttempts)) {
    throw new Error(`--max-attempts must be an integer, got "${String(maxAttempts)}"`);
  }
  const vlmTimeoutSec = parsePositive(flags.vlmTimeout, '--vlm-timeout') ?? fileConfig.vlmTimeout;
  const actionTimeoutSec =
    parsePositive(flags.actionTimeout, '--action-timeout') ?? fileConfig.actionTimeout;

  return {
    startUrl: flags.startUrl ?? fileConfig.startUrl,
    headless: flags.headless ?? fileConfig.headless,
    maxAttempts: maxAttempts ?? fileConfig.maxAttempts,
    vlmTimeoutMs: vlmTimeoutSec !== undefined ? vlmTimeoutSec * 1000 : TIMEOUTS.VLM_TIMEOUT,
    actionTimeoutMs:
      actionTimeoutSec !== undefined ? actionTimeoutSec * 1000 : TIMEOUTS.ACTION_TIMEOUT,
    reportPath: flags.reportPath ?? fileConfig.reportPath ?? '.artifacts',
    viewport: fileConfig.viewport,
    browserPath: flags.browserPath ?? env['CHROMIUM_PATH'],
  };
}

function llmConfigFor(role: LLMRole, override: ProviderConfig | undefined): LLMConfig {
  // A provider named in the config file wins over the environment.
  const env = override?.provider !== undefined
    ? { ...process.env, [`${role.toUpperCase()}_PROVIDER`]: override.provider }
    : process.env;

  const config = loadLLMConfig(role, env);
  return override?.model !== undefined ? { ...config, model: override.model } : config;
}

// ── Stderr summary ───────────────────────────────────────────

function printSummary(report: RunReport): void {
  const completed = report.result.steps.filter((s) => s.status === 'completed').length;

  process.stderr.write(`\n--- visionpilot Result ---\n`);
  process.stderr.write(`Intent:  ${report.intent}\n`);
  process.stderr.write(`Result:  ${formatStatus(report.result)}\n`);
  process.stderr.write(
    `Steps:   ${String(completed)}/${String(report.plan.steps.length)} completed\n`,
  );
  process.stderr.write(`Time:    ${(report.durationMs / 1000).toFixed(1)}s\n`);
  process.stderr.write(`Trace:   ${report.tracePath}\n`);
  process.stderr.write(`Run ID:  ${report.runId}\n\n`);
}

// ── Command registration ─────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Plan an intent and drive the browser through it step by step')
    .argument('<intent>', 'Natural language goal, e.g. "Send 500 Rs to Rohit"')
    .option('--start-url <url>', 'Page to open before the first step')
    .option('--headless', 'Run browser headless')
    .option('--max-attempts <n>', `Attempts per step (default ${String(LIMITS.MAX_ATTEMPTS)})`)
    .option('--vlm-timeout <seconds>', 'Timeout for one VLM call')
    .option('--action-timeout <seconds>', 'Timeout for one browser action')
    .option('--report-path <dir>', 'Artifact directory (default .artifacts)')
    .option('--config <path>', 'Path to config file', DEFAULT_CONFIG_PATH)
    .option('--browser-path <path>', 'Chromium executable (or set CHROMIUM_PATH)')
    .option('--json', 'Output JSON to stdout')
    .action(async (intent: string, flags: RunFlags) => {
      // 1. Config: file, then flags on top
      let fileConfig: FileConfig;
      let options: ResolvedRunOptions;
      try {
        fileConfig = await loadOptionalConfigFile(
          flags.config,
          flags.config !== DEFAULT_CONFIG_PATH,
        );
        options = resolveRunOptions(flags, fileConfig);
      } catch (err) {
        process.stderr.write(`Config error: ${errorMessage(err)}\n`);
        process.exitCode = EXIT_CONFIG_ERROR;
        return;
      }

      try {
        process.exitCode = await runCommand(intent, fileConfig, options, flags.json === true);
      } catch (err) {
        if (err instanceof PlanningError) {
          log.error(`Planning failed: ${err.message}`);
          process.exitCode = err.exitCode;
          return;
        }
        process.stderr.write(`Error: ${errorMessage(err)}\n`);
        process.exitCode = EXIT_CONFIG_ERROR;
      }
    });
}

// ── Run pipeline ─────────────────────────────────────────────

async function runCommand(
  intent: string,
  fileConfig: FileConfig,
  options: ResolvedRunOptions,
  json: boolean,
): Promise<number> {
  const runId = randomUUID();
  const startedAt = new Date();
  const outputDir = path.resolve(options.reportPath, runId);
  await mkdir(outputDir, { recursive: true });

  const planner = createLLMPlanner(createLLMClient(llmConfigFor('planner', fileConfig.planner)));
  const vision = createVisionModel(createLLMClient(llmConfigFor('vlm', fileConfig.vlm)));
  const sink = new JsonlTraceSink(outputDir);
  const recorder = new TraceRecorder([sink]);

  // Ctrl-C stops the run after the in-flight attempt
  const abort = new AbortController();
  const onSigint = (): void => {
    log.warn('Interrupt received, stopping after the current attempt');
    abort.abort();
  };

  // The browser opens only once the planner has produced a plan.
  const opened: BrowserSession[] = [];
  const connect = async (): Promise<RunDeps> => {
    const session = await launchSession({
      headless: options.headless,
      screenshotDir: path.join(outputDir, 'screenshots'),
      viewport: options.viewport,
      startUrl: options.startUrl,
      executablePath: options.browserPath,
      actionTimeoutMs: options.actionTimeoutMs,
    });
    opened.push(session);
    process.once('SIGINT', onSigint);
    return { vision, browser: session, recorder };
  };

  let report: RunReport;
  try {
    const { plan, result } = await runIntent(intent, planner, connect, {
      maxAttempts: options.maxAttempts,
      vlmTimeoutMs: options.vlmTimeoutMs,
      actionTimeoutMs: options.actionTimeoutMs,
      signal: abort.signal,
    });

    const finishedAt = new Date();
    report = {
      runId,
      intent,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      plan,
      result,
      trace: recorder.entries(),
      tracePath: sink.filePath,
    };
  } finally {
    process.removeListener('SIGINT', onSigint);
    for (const session of opened) {
      await session.close();
    }
  }

  // Artifacts
  await writeFile(path.join(outputDir, 'report.md'), generateMarkdown(report), 'utf-8');
  const output = generateJSON(report);
  await writeFile(path.join(outputDir, 'summary.json'), serializeJSON(output) + '\n', 'utf-8');

  if (json) {
    process.stdout.write(serializeJSON(output) + '\n');
  }

  printSummary(report);
  return exitCodeFor(report.result);
}
