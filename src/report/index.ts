/**
 * Report generation module.
 * Deterministic — no network.
 * Turns a probe response into the text written to stdout.
 */

export { formatResponseDump, formatResponseHead, formatStatusLine } from './dump.js';
