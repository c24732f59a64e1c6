/**
 * Live execution logger for taskrun.
 *
 * All output goes to stderr so stdout stays clean for help text and the
 * response dump.
 * Emoji prefixes give instant visual context in the terminal.
 */

import type { ProbeTarget } from '../schema/index.js';

// ── Core write ──────────────────────────────────────────────

function write(message: string): void {
  process.stderr.write(message + '\n');
}

// ── Helpers ─────────────────────────────────────────────────

export function formatTarget(target: ProbeTarget): string {
  return `http://${target.host}:${String(target.port)}${target.path}`;
}

// ── Public API ──────────────────────────────────────────────

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`);
}

export function error(message: string): void {
  write(`💥 ${message}`);
}

export function probe(target: ProbeTarget, timeoutMs: number): void {
  write(`🌐 GET ${formatTarget(target)} (timeout ${String(timeoutMs)}ms)`);
}

export function response(statusCode: number, headerCount: number): void {
  write(`📨 ${String(statusCode)} with ${String(headerCount)} headers`);
}
