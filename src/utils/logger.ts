/**
 * Live run log for visionpilot.
 *
 * Everything goes to stderr; stdout is reserved for `--json` output.
 * One function per event so call sites read as a narrative of the run.
 */

function write(message: string): void {
  process.stderr.write(message + '\n');
}

const RULE = '─'.repeat(50);

// ── Run structure ───────────────────────────────────────────

export function section(title: string): void {
  write(`\n${RULE}\n▶  ${title}\n${RULE}`);
}

export function step(index: number, total: number, description: string): void {
  write(`📋 [${String(index + 1)}/${String(total)}] ${description}`);
}

export function stepResult(index: number, completed: boolean, description: string): void {
  write(`${completed ? '✅' : '❌'} Step ${String(index + 1)}: ${description}`);
}

// ── Attempts ────────────────────────────────────────────────

export function attempt(stepIndex: number, attemptNumber: number, max: number): void {
  write(`🔁 Step ${String(stepIndex + 1)} attempt ${String(attemptNumber)}/${String(max)}`);
}

export function proposal(description: string): void {
  write(`👁️  VLM proposes: ${description}`);
}

export function rejected(kind: string, reason: string): void {
  write(`🛑 Rejected (${kind}): ${reason}`);
}

// ── Models ──────────────────────────────────────────────────

export function llm(message: string): void {
  write(`🧠 ${message}`);
}

export function planned(stepCount: number): void {
  write(`🧠 Planner: ${String(stepCount)} step${stepCount === 1 ? '' : 's'}`);
}

// ── General ─────────────────────────────────────────────────

export function detail(message: string): void {
  write(`   ${message}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}
