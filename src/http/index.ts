/**
 * HTTP probe module.
 * The only module allowed to open network connections.
 */

export { probe, runProbe, ConnectionError, describeSocketError } from './probe.js';
export type { ProbeOptions } from './probe.js';
