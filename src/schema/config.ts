import { z } from 'zod';

// ── Numeric strings (flags + env) ───────────────────────────

const numericString = z
  .string()
  .trim()
  .regex(/^\d+$/, 'Expected a whole number')
  .transform(Number);

// ── Config file ─────────────────────────────────────────────

export const fileConfigSchema = z
  .object({
    target: z
      .object({
        host: z.string().min(1).optional(),
        port: z.number().int().optional(),
        path: z.string().optional(),
      })
      .strict()
      .optional(),
    timeoutMs: z.number().optional(),
  })
  .strict();

export type FileConfig = z.infer<typeof fileConfigSchema>;

// ── Environment overrides ───────────────────────────────────

export const envOverridesSchema = z.object({
  TASKRUN_HOST: z.string().min(1).optional(),
  TASKRUN_PORT: numericString.optional(),
  TASKRUN_PATH: z.string().optional(),
  TASKRUN_TIMEOUT_MS: numericString.optional(),
});

export type EnvOverrides = z.infer<typeof envOverridesSchema>;

// ── CLI flags ───────────────────────────────────────────────

export const flagOverridesSchema = z.object({
  host: z.string().min(1).optional(),
  port: numericString.optional(),
  path: z.string().optional(),
  timeout: numericString.optional(),
});

export type FlagOverrides = z.infer<typeof flagOverridesSchema>;
