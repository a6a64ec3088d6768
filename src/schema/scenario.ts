import { z } from 'zod';

import { automationAssertionSchema, waitConditionSchema } from './step.js';
import type { ParseWarning, Step } from './step.js';

// ── Step spec (YAML) ──────────────────────────────────────────
// A step is either a plain sentence or the structured dual-mode map.

const scalarText = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((v) => String(v));

export const automationSpecSchema = z.object({
  selector: z.string().optional(),
  wait_for: waitConditionSchema.optional(),
  timeout: z.number().int().positive().optional(),
  assertions: z.array(automationAssertionSchema).optional(),
});

export type AutomationSpec = z.infer<typeof automationSpecSchema>;

export const stepSpecMapSchema = z.object({
  description: z.string().optional(),
  action: z.string().min(1),
  target: scalarText.optional(),
  value: scalarText.optional(),
  timeout: z.number().int().positive().optional(),
  human_instruction: z.string().optional(),
  automation: automationSpecSchema.optional(),
});

export type StepSpecMap = z.infer<typeof stepSpecMapSchema>;

export const stepSpecSchema = z.union([z.string(), stepSpecMapSchema]);

export type StepSpec = z.infer<typeof stepSpecSchema>;

// ── Scenario document ─────────────────────────────────────────

export const scenarioSpecSchema = z.object({
  name: z.string().min(1).default('Unnamed Scenario'),
  description: z.string().default(''),
  tags: z.array(z.string()).default([]),
  url: z.string().min(1).optional(),
  steps: z.array(stepSpecSchema).default([]),
});

export type ScenarioSpec = z.infer<typeof scenarioSpecSchema>;

export const scenarioFileSchema = z.object({
  scenarios: z.array(scenarioSpecSchema),
});

export type ScenarioFile = z.infer<typeof scenarioFileSchema>;

// ── Compiled scenario ─────────────────────────────────────────

export interface Scenario {
  readonly name: string;
  readonly description: string;
  readonly tags: readonly string[];
  readonly url?: string | undefined;
  readonly steps: readonly Step[];
  readonly warnings: readonly ParseWarning[];
  readonly source?: string | undefined;
}
