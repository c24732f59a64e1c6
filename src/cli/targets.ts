import { ConfigError } from '../config/index.js';
import { CommandRegistry, HELP_COMMAND, runHelp } from '../core/index.js';
import type { OutputSink, ReadonlyRegistry } from '../core/index.js';
import { runProbe } from '../http/index.js';
import type { ProbeSettings } from '../schema/index.js';
import * as log from '../utils/logger.js';

export const CHECK_COMMAND = 'check';

export const TARGET_DESCRIPTIONS = {
  [HELP_COMMAND]: 'Display this help message.',
  [CHECK_COMMAND]: 'Runs a request including headers to our server',
} as const;

export interface TargetDeps {
  out: OutputSink;
  /** Resolved lazily so a bad probe config never breaks `help`. */
  loadSettings: () => Promise<ProbeSettings>;
}

async function runCheck(deps: TargetDeps): Promise<number> {
  let settings: ProbeSettings;
  try {
    settings = await deps.loadSettings();
  } catch (err) {
    if (err instanceof ConfigError) {
      log.error(`Config error: ${err.message}`);
      return err.exitCode;
    }
    throw err;
  }
  return runProbe(settings, deps.out);
}

export function createTargetRegistry(deps: TargetDeps): ReadonlyRegistry {
  const registry = new CommandRegistry();
  registry
    .register(HELP_COMMAND, TARGET_DESCRIPTIONS[HELP_COMMAND], () =>
      runHelp(registry, deps.out),
    )
    .register(CHECK_COMMAND, TARGET_DESCRIPTIONS[CHECK_COMMAND], () =>
      runCheck(deps),
    );
  return registry.seal();
}
