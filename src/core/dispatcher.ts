import { EXIT_CODES } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { runHelp } from './help.js';
import type { OutputSink } from './help.js';
import { UnknownCommandError } from './registry.js';
import type { CommandAction, ReadonlyRegistry } from './registry.js';

export const HELP_COMMAND = 'help';

// ── Public types ─────────────────────────────────────────────

export interface DispatcherOptions {
  /** Name shown in usage diagnostics. */
  programName?: string | undefined;
  /** Where the fallback help listing goes when no `help` target is registered. */
  out?: OutputSink | undefined;
}

// ── Dispatcher ───────────────────────────────────────────────

export class Dispatcher {
  private readonly programName: string;
  private readonly out: OutputSink;

  constructor(
    private readonly registry: ReadonlyRegistry,
    options: DispatcherOptions = {},
  ) {
    this.programName = options.programName ?? 'taskrun';
    this.out = options.out ?? process.stdout;
  }

  async dispatch(argv: readonly string[]): Promise<number> {
    const [name = HELP_COMMAND, ...extra] = argv;

    if (extra.length > 0) {
      log.warn(`Ignoring extra arguments: ${extra.join(' ')}`);
    }

    if (name === HELP_COMMAND) {
      try {
        await this.runHelpAction();
      } catch (err) {
        return this.reportFailure(name, err);
      }
      return EXIT_CODES.OK;
    }

    let action: CommandAction;
    try {
      action = this.registry.resolve(name);
    } catch (err) {
      if (err instanceof UnknownCommandError) {
        log.error(
          `Unknown target "${err.commandName}". Run "${this.programName} ${HELP_COMMAND}" to list available targets.`,
        );
        return err.exitCode;
      }
      throw err;
    }

    try {
      return await action();
    } catch (err) {
      return this.reportFailure(name, err);
    }
  }

  private reportFailure(name: string, err: unknown): number {
    const message = err instanceof Error ? err.message : String(err);
    log.error(`Target "${name}" failed: ${message}`);
    return EXIT_CODES.FAILURE;
  }

  private async runHelpAction(): Promise<void> {
    if (this.registry.has(HELP_COMMAND)) {
      await this.registry.resolve(HELP_COMMAND)();
      return;
    }
    await runHelp(this.registry, this.out);
  }
}
