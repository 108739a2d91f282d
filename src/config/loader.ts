import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';

// ── Public API ──────────────────────────────────────────────

export const DEFAULT_CONFIG_PATH = '.visionpilot.yaml';

/**
 * Load and validate a `.visionpilot.yaml` (or JSON) config file.
 * Throws a descriptive error if the file is invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  const raw = await readFile(configPath, 'utf-8');

  const parsed: unknown = configPath.endsWith('.json')
    ? JSON.parse(raw)
    : parseYaml(raw);

  return fileConfigSchema.parse(parsed ?? {});
}

/**
 * Like loadConfigFile, but a missing file at the default location is not
 * an error: it yields the schema defaults.
 */
export async function loadOptionalConfigFile(
  configPath: string,
  required: boolean,
): Promise<FileConfig> {
  try {
    return await loadConfigFile(configPath);
  } catch (err) {
    if (!required && isMissingFile(err)) {
      return fileConfigSchema.parse({});
    }
    throw err;
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
