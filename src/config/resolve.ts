import { envOverridesSchema, flagOverridesSchema, probeSettingsSchema } from '../schema/index.js';
import type { FileConfig, ProbeSettings } from '../schema/index.js';
import { PROBE_TARGET, TIMEOUTS } from './defaults.js';
import { ConfigError, describeZodError } from './loader.js';

// ── Inputs ───────────────────────────────────────────────────

export interface SettingsSources {
  /** Raw commander option values. */
  flags?: Record<string, unknown> | undefined;
  env?: NodeJS.ProcessEnv | undefined;
  file?: FileConfig | undefined;
}

// ── Merge ────────────────────────────────────────────────────
// Precedence: CLI flag > environment > config file > default.

export function resolveProbeSettings(sources: SettingsSources = {}): ProbeSettings {
  const flagResult = flagOverridesSchema.safeParse(sources.flags ?? {});
  if (!flagResult.success) {
    throw new ConfigError('flags', describeZodError(flagResult.error), {
      cause: flagResult.error,
    });
  }

  const envResult = envOverridesSchema.safeParse(sources.env ?? {});
  if (!envResult.success) {
    throw new ConfigError('environment', describeZodError(envResult.error), {
      cause: envResult.error,
    });
  }

  const flags = flagResult.data;
  const env = envResult.data;
  const file = sources.file ?? {};

  const merged = {
    target: {
      host: flags.host ?? env.TASKRUN_HOST ?? file.target?.host ?? PROBE_TARGET.host,
      port: flags.port ?? env.TASKRUN_PORT ?? file.target?.port ?? PROBE_TARGET.port,
      path: flags.path ?? env.TASKRUN_PATH ?? file.target?.path ?? PROBE_TARGET.path,
    },
    timeoutMs:
      flags.timeout ?? env.TASKRUN_TIMEOUT_MS ?? file.timeoutMs ?? TIMEOUTS.PROBE_TIMEOUT,
  };

  const result = probeSettingsSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError('settings', describeZodError(result.error), {
      cause: result.error,
    });
  }
  return result.data;
}
