import { z } from 'zod';

import { actionKindSchema } from './step.js';
import { errorKindSchema, pageMetricsSchema } from './results.js';

// ── Version ─────────────────────────────────────────────────
// Bump this when the contract changes.

export const JSON_OUTPUT_VERSION = '1.0' as const;

// ── Step output ─────────────────────────────────────────────

export const jsonOutputStepSchema = z.object({
  index: z.number().int().nonnegative(),
  action: actionKindSchema,
  description: z.string(),
  target: z.string(),
  value: z.string().optional(),
  succeeded: z.boolean(),
  errorKind: errorKindSchema.optional(),
  diagnostic: z.string().optional(),
  elapsedMs: z.number().int().nonnegative(),
  screenshotPath: z.string().optional(),
});

export type JsonOutputStep = z.infer<typeof jsonOutputStepSchema>;

// ── Warning output ──────────────────────────────────────────

export const jsonOutputWarningSchema = z.object({
  index: z.number().int().nonnegative().optional(),
  rawText: z.string(),
  reason: z.string(),
});

export type JsonOutputWarning = z.infer<typeof jsonOutputWarningSchema>;

// ── Scenario output ─────────────────────────────────────────

export const jsonOutputScenarioSchema = z.object({
  name: z.string().min(1),
  url: z.string(),
  status: z.enum(['passed', 'failed', 'cancelled']),
  aborted: z.boolean(),
  abortedAtIndex: z.number().int().nonnegative().optional(),
  failure: z
    .object({ errorKind: errorKindSchema, diagnostic: z.string() })
    .optional(),
  metrics: pageMetricsSchema.optional(),
  durationMs: z.number().int().nonnegative(),
  steps: z.array(jsonOutputStepSchema),
  warnings: z.array(jsonOutputWarningSchema),
});

export type JsonOutputScenario = z.infer<typeof jsonOutputScenarioSchema>;

// ── Root output ─────────────────────────────────────────────

export const jsonOutputSchema = z.object({
  version: z.literal(JSON_OUTPUT_VERSION),
  exitCode: z.number().int().nonnegative(),
  passed: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  scenarios: z.array(jsonOutputScenarioSchema),
});

export type JsonOutput = z.infer<typeof jsonOutputSchema>;
