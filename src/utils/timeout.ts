// ── Error ────────────────────────────────────────────────────

export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${String(timeoutMs)}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

// ── Wrapper ──────────────────────────────────────────────────

/**
 * Race `task` against a timer. The task is not interrupted on timeout;
 * its eventual result is discarded.
 */
export async function withTimeout<T>(
  task: () => Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });

  const pending = task();
  // A task that settles after losing the race must not surface as unhandled.
  pending.catch(() => undefined);

  try {
    return await Promise.race([pending, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
