import type { ProbeResponse } from '../schema/index.js';

const CRLF = '\r\n';

// ── Response dump ────────────────────────────────────────────
// Same layout as `curl -i`: status line, headers as received, blank line, body.

export function formatStatusLine(res: ProbeResponse): string {
  const message = res.statusMessage.length > 0 ? ` ${res.statusMessage}` : '';
  return `HTTP/${res.httpVersion} ${String(res.statusCode)}${message}`;
}

/** Status line and headers, terminated by the blank line. */
export function formatResponseHead(res: ProbeResponse): string {
  const head = [
    formatStatusLine(res),
    ...res.headers.map(([name, value]) => `${name}: ${value}`),
  ];
  return head.join(CRLF) + CRLF + CRLF;
}

/** Head as text, then the body bytes exactly as received. */
export function formatResponseDump(res: ProbeResponse): Buffer {
  return Buffer.concat([Buffer.from(formatResponseHead(res), 'latin1'), res.body]);
}
