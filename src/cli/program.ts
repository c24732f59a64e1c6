import { Command, CommanderError } from 'commander';

import { TASKRUN_VERSION, loadConfigFile, resolveProbeSettings } from '../config/index.js';
import { Dispatcher } from '../core/index.js';
import type { OutputSink } from '../core/index.js';
import type { ProbeSettings } from '../schema/index.js';
import * as log from '../utils/logger.js';
import { createTargetRegistry } from './targets.js';

// ── IO boundary ──────────────────────────────────────────────

// Diagnostics always go to stderr through utils/logger.
export interface CliIO {
  out: OutputSink;
  env: NodeJS.ProcessEnv;
}

function defaultIO(): CliIO {
  return { out: process.stdout, env: process.env };
}

interface CliOptions {
  host?: string;
  port?: string;
  path?: string;
  timeout?: string;
  config?: string;
}

// ── Program ──────────────────────────────────────────────────

export function createProgram(
  io: CliIO,
  onExit: (code: number) => void,
): Command {
  const program = new Command();

  program
    .name('taskrun')
    .description(
      'Tiny task runner. Lists its targets, or probes the local HTTP server and prints the response with headers.',
    )
    .version(TASKRUN_VERSION)
    .argument('[target]', 'Target to run (run "help" to list them)')
    .option('--host <host>', 'Probe host (env TASKRUN_HOST)')
    .option('--port <port>', 'Probe port (env TASKRUN_PORT)')
    .option('--path <path>', 'Request path (env TASKRUN_PATH)')
    .option('--timeout <ms>', 'Probe timeout in milliseconds (env TASKRUN_TIMEOUT_MS)')
    .option('--config <file>', 'YAML or JSON config file')
    .allowExcessArguments(true)
    .allowUnknownOption(true)
    .exitOverride()
    .configureOutput({
      writeOut: (str) => {
        io.out.write(str);
      },
    })
    .action(async (_target: string | undefined, opts: CliOptions, command: Command) => {
      const loadSettings = async (): Promise<ProbeSettings> => {
        const file =
          opts.config !== undefined ? await loadConfigFile(opts.config) : undefined;
        if (opts.config !== undefined) {
          log.info(`Loaded config from ${opts.config}`);
        }
        return resolveProbeSettings({
          flags: {
            host: opts.host,
            port: opts.port,
            path: opts.path,
            timeout: opts.timeout,
          },
          env: io.env,
          file,
        });
      };

      const registry = createTargetRegistry({ out: io.out, loadSettings });
      const dispatcher = new Dispatcher(registry, {
        programName: program.name(),
        out: io.out,
      });
      onExit(await dispatcher.dispatch(command.args));
    });

  return program;
}

/**
 * Parse `argv` (user arguments only, no node/script prefix) and run the
 * selected target. Resolves to the process exit status.
 */
export async function runCli(
  argv: readonly string[],
  io: CliIO = defaultIO(),
): Promise<number> {
  let exitCode = 0;
  const program = createProgram(io, (code) => {
    exitCode = code;
  });
  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (err) {
    // --help, --version and usage errors; commander has already printed them.
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }
  return exitCode;
}
