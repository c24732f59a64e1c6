import type { OutputSink } from '../core/help.js';

/** Collects everything written to it; stands in for stdout in tests. */
export class MemorySink implements OutputSink {
  private readonly chunks: Buffer[] = [];

  write(chunk: string | Uint8Array): boolean {
    this.chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : Buffer.from(chunk));
    return true;
  }

  bytes(): Buffer {
    return Buffer.concat(this.chunks);
  }

  text(): string {
    return this.bytes().toString('utf-8');
  }
}
