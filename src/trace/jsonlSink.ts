import { appendFile, mkdir, readFile } from 'node:fs/promises';
import path from 'node:path';

import type { TraceEntry } from '../schema/index.js';
import { parseTraceEntry } from '../schema/index.js';
import type { TraceSink } from './recorder.js';

export const TRACE_FILE_NAME = 'trace.jsonl';

// ── Sink ─────────────────────────────────────────────────────

/**
 * Appends one JSON line per trace entry. Screenshots stay where the
 * browser session wrote them; records carry their paths.
 */
export class JsonlTraceSink implements TraceSink {
  readonly filePath: string;
  private ready: Promise<void> | undefined;

  constructor(outputDir: string) {
    this.filePath = path.join(outputDir, TRACE_FILE_NAME);
  }

  async write(entry: TraceEntry): Promise<void> {
    this.ready ??= mkdir(path.dirname(this.filePath), { recursive: true }).then(
      () => undefined,
    );
    await this.ready;
    await appendFile(this.filePath, JSON.stringify(entry) + '\n', 'utf-8');
  }
}

// ── Reader ───────────────────────────────────────────────────

/** Read a trace file back, validating every line. */
export async function readTraceFile(filePath: string): Promise<TraceEntry[]> {
  const raw = await readFile(filePath, 'utf-8');

  return raw
    .split('\n')
    .filter((line) => line.trim().length > 0)
    .map((line, i) => {
      try {
        return parseTraceEntry(JSON.parse(line));
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new Error(`${filePath}:${String(i + 1)}: invalid trace entry: ${message}`);
      }
    });
}
