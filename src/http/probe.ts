import { request } from 'node:http';

import { EXIT_CODES, TASKRUN_VERSION, TIMEOUTS } from '../config/defaults.js';
import type { OutputSink } from '../core/help.js';
import { formatResponseDump } from '../report/index.js';
import { probeResponseSchema } from '../schema/index.js';
import type { HeaderLine, ProbeResponse, ProbeSettings, ProbeTarget } from '../schema/index.js';
import * as log from '../utils/logger.js';

// ── Error ────────────────────────────────────────────────────

export class ConnectionError extends Error {
  readonly exitCode = EXIT_CODES.FAILURE;

  constructor(
    readonly target: ProbeTarget,
    readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Could not reach ${log.formatTarget(target)}: ${reason}`, options);
    this.name = 'ConnectionError';
  }
}

// ── Public types ─────────────────────────────────────────────

export interface ProbeOptions {
  timeoutMs?: number | undefined;
}

// ── Socket error mapping ─────────────────────────────────────

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err) {
    const code = err.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function describeSocketError(err: unknown): string {
  switch (errorCode(err)) {
    case 'ECONNREFUSED':
      return 'connection refused';
    case 'ENOTFOUND':
    case 'EAI_AGAIN':
      return 'host not found';
    case 'ECONNRESET':
      return 'connection reset by peer';
    default:
      return err instanceof Error ? err.message : String(err);
  }
}

// rawHeaders is a flat [name, value, name, value, ...] list in receipt order.
function pairHeaders(rawHeaders: readonly string[]): HeaderLine[] {
  const pairs: HeaderLine[] = [];
  for (let i = 0; i + 1 < rawHeaders.length; i += 2) {
    pairs.push([rawHeaders[i] ?? '', rawHeaders[i + 1] ?? '']);
  }
  return pairs;
}

// ── Probe ────────────────────────────────────────────────────

/**
 * Issue a single GET against `target`.
 *
 * Resolves for any HTTP status; a 404 or 500 is still a response.
 * Rejects with ConnectionError when the whole exchange (connect, headers
 * and body) takes longer than `timeoutMs`, or the socket fails. No retries.
 */
export function probe(
  target: ProbeTarget,
  options: ProbeOptions = {},
): Promise<ProbeResponse> {
  const timeoutMs = options.timeoutMs ?? TIMEOUTS.PROBE_TIMEOUT;

  return new Promise<ProbeResponse>((resolve, reject) => {
    let timer: NodeJS.Timeout | undefined;

    const fail = (err: unknown): void => {
      clearTimeout(timer);
      reject(
        err instanceof ConnectionError
          ? err
          : new ConnectionError(target, describeSocketError(err), { cause: err }),
      );
    };

    const req = request({
      host: target.host,
      port: target.port,
      path: target.path,
      method: 'GET',
      agent: false,
      headers: {
        'User-Agent': `taskrun/${TASKRUN_VERSION}`,
        Accept: '*/*',
        Connection: 'close',
      },
    });

    // Wall-clock deadline: a server trickling bytes must not extend it.
    timer = setTimeout(() => {
      const timedOut = new ConnectionError(target, `timed out after ${String(timeoutMs)}ms`);
      fail(timedOut);
      req.destroy(timedOut);
    }, timeoutMs);

    req.on('error', fail);

    req.on('response', (res) => {
      const chunks: Buffer[] = [];
      res.on('data', (chunk: Buffer) => {
        chunks.push(chunk);
      });
      res.on('error', fail);
      res.on('end', () => {
        clearTimeout(timer);
        const parsed = probeResponseSchema.safeParse({
          httpVersion: res.httpVersion,
          statusCode: res.statusCode,
          statusMessage: res.statusMessage ?? '',
          headers: pairHeaders(res.rawHeaders),
          body: Buffer.concat(chunks),
        });
        if (parsed.success) {
          resolve(parsed.data);
        } else {
          fail(new Error(`malformed response: ${parsed.error.message}`));
        }
      });
    });

    req.end();
  });
}

// ── Action ───────────────────────────────────────────────────

/**
 * The `check` target: probe, then dump the response to `out`.
 * Connection failures are reported on stderr and map to exit status 1.
 */
export async function runProbe(
  settings: ProbeSettings,
  out: OutputSink,
): Promise<number> {
  log.probe(settings.target, settings.timeoutMs);

  let response: ProbeResponse;
  try {
    response = await probe(settings.target, { timeoutMs: settings.timeoutMs });
  } catch (err) {
    if (err instanceof ConnectionError) {
      log.error(err.message);
      return err.exitCode;
    }
    throw err;
  }

  log.response(response.statusCode, response.headers.length);
  out.write(formatResponseDump(response));
  return EXIT_CODES.OK;
}
