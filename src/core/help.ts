import { EXIT_CODES } from '../config/defaults.js';
import type { ReadonlyRegistry } from './registry.js';

/** Anything output can be written to: process.stdout, or a buffer in tests. */
export interface OutputSink {
  write(chunk: string | Uint8Array): unknown;
}

export const HELP_HEADER = 'Available targets:';

export function formatHelpLine(name: string, description: string): string {
  const sentence = description.endsWith('.') ? description : `${description}.`;
  return `  - ${name}: ${sentence}`;
}

export function renderHelp(registry: ReadonlyRegistry): string {
  const lines = [HELP_HEADER];
  for (const { name, description } of registry.list()) {
    lines.push(formatHelpLine(name, description));
  }
  return lines.join('\n') + '\n';
}

export async function runHelp(
  registry: ReadonlyRegistry,
  out: OutputSink,
): Promise<number> {
  out.write(renderHelp(registry));
  return EXIT_CODES.OK;
}
