import { z } from 'zod';

// ── ProbeResponse ─────────────────────────────────────────────

export const headerLineSchema = z.tuple([z.string(), z.string()]);

export type HeaderLine = z.infer<typeof headerLineSchema>;

export const probeResponseSchema = z.object({
  httpVersion: z.string().min(1),
  statusCode: z.number().int().min(100).max(999),
  statusMessage: z.string(),
  /** Header lines in the order they arrived on the wire. */
  headers: z.array(headerLineSchema),
  body: z.instanceof(Buffer),
});

export type ProbeResponse = z.infer<typeof probeResponseSchema>;
