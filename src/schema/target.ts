import { z } from 'zod';

// ── ProbeTarget ───────────────────────────────────────────────

export const probeTargetSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65_535),
  path: z.string().startsWith('/'),
});

export type ProbeTarget = z.infer<typeof probeTargetSchema>;

// ── ProbeSettings ─────────────────────────────────────────────

export const probeSettingsSchema = z.object({
  target: probeTargetSchema,
  timeoutMs: z.number().int().positive(),
});

export type ProbeSettings = z.infer<typeof probeSettingsSchema>;
