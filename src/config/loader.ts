import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';
import type { ZodError } from 'zod';

import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';
import { EXIT_CODES } from './defaults.js';

// ── Error ────────────────────────────────────────────────────

export class ConfigError extends Error {
  readonly exitCode = EXIT_CODES.CONFIG;

  constructor(
    readonly source: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${source}: ${message}`, options);
    this.name = 'ConfigError';
  }
}

export function describeZodError(err: ZodError): string {
  return err.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.taskrun.yaml` (or JSON) config file.
 * Throws a ConfigError if the file is missing or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(configPath, `cannot read file (${message})`, { cause: err });
  }

  let parsed: unknown;
  try {
    parsed = configPath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(configPath, `cannot parse file (${message})`, { cause: err });
  }

  const result = fileConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new ConfigError(configPath, describeZodError(result.error), {
      cause: result.error,
    });
  }
  return result.data;
}
