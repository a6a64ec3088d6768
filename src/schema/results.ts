import { z } from 'zod';

import { parseWarningSchema, stepSchema } from './step.js';

// ── Error kinds ───────────────────────────────────────────────

export const errorKindSchema = z.enum([
  'ElementNotFound',
  'ActionError',
  'NavigationError',
  'ValidationError',
]);

export type ErrorKind = z.infer<typeof errorKindSchema>;

// ── StepResult ────────────────────────────────────────────────

export const stepResultSchema = z.object({
  index: z.number().int().nonnegative(),
  step: stepSchema,
  succeeded: z.boolean(),
  errorKind: errorKindSchema.optional(),
  diagnostic: z.string().optional(),
  elapsedMs: z.number().int().nonnegative(),
  screenshotPath: z.string().optional(),
});

export type StepResult = z.infer<typeof stepResultSchema>;

// ── Page metrics ──────────────────────────────────────────────
// Milliseconds from navigation start, read from the Performance API.

export const pageMetricsSchema = z.object({
  pageLoadMs: z.number().nonnegative(),
  domContentLoadedMs: z.number().nonnegative(),
  firstPaintMs: z.number().nonnegative(),
  firstContentfulPaintMs: z.number().nonnegative(),
});

export type PageMetrics = z.infer<typeof pageMetricsSchema>;

// ── ScenarioResult ────────────────────────────────────────────

export const scenarioFailureSchema = z.object({
  errorKind: errorKindSchema,
  diagnostic: z.string(),
  stepIndex: z.number().int().nonnegative().optional(),
});

export type ScenarioFailure = z.infer<typeof scenarioFailureSchema>;

export const scenarioResultSchema = z.object({
  name: z.string().min(1),
  url: z.string(),
  results: z.array(stepResultSchema),
  aborted: z.boolean(),
  abortedAtIndex: z.number().int().nonnegative().optional(),
  cancelled: z.boolean(),
  failure: scenarioFailureSchema.optional(),
  metrics: pageMetricsSchema.optional(),
  warnings: z.array(parseWarningSchema),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  durationMs: z.number().int().nonnegative(),
});

export type ScenarioResult = z.infer<typeof scenarioResultSchema>;

// ── Deterministic outcome ─────────────────────────────────────

export type ScenarioStatus = 'passed' | 'failed' | 'cancelled';

export function scenarioStatus(result: ScenarioResult): ScenarioStatus {
  if (result.failure !== undefined) return 'failed';
  if (result.cancelled) return 'cancelled';
  return result.aborted ? 'failed' : 'passed';
}

/** Exit code for a batch: 0 only when every scenario passed. */
export function computeExitCode(results: readonly ScenarioResult[]): number {
  return results.every((r) => scenarioStatus(r) === 'passed') ? 0 : 1;
}
