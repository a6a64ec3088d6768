import { z } from 'zod';

// ── Action kind discriminator ─────────────────────────────────

export const actionKindSchema = z.enum([
  'click',
  'type',
  'select',
  'verify',
  'wait',
  'scroll',
  'hover',
  'assert',
]);

export type ActionKind = z.infer<typeof actionKindSchema>;

export const ACTION_KINDS: readonly ActionKind[] = actionKindSchema.options;

// ── Automation block (structured step form) ───────────────────

export const waitConditionSchema = z.enum([
  'element_present',
  'element_visible',
  'element_clickable',
]);

export type WaitCondition = z.infer<typeof waitConditionSchema>;

export const automationAssertionSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('element_visible'),
    selector: z.string().min(1),
  }),
  z.object({
    type: z.literal('text_present'),
    selector: z.string().min(1),
    text: z.string(),
  }),
  z.object({
    type: z.literal('minimum_elements'),
    selector: z.string().min(1),
    count: z.number().int().nonnegative(),
  }),
]);

export type AutomationAssertion = z.infer<typeof automationAssertionSchema>;

export const stepAutomationSchema = z.object({
  selector: z.string().min(1).optional(),
  waitFor: waitConditionSchema.optional(),
  timeoutSeconds: z.number().int().positive().optional(),
  assertions: z.array(automationAssertionSchema),
});

export type StepAutomation = z.infer<typeof stepAutomationSchema>;

// ── Step ──────────────────────────────────────────────────────

export const DEFAULT_STEP_TIMEOUT_SECONDS = 10;

export const stepSchema = z.object({
  rawText: z.string().min(1),
  action: actionKindSchema,
  target: z.string().min(1),
  value: z.string().optional(),
  timeoutSeconds: z.number().int().nonnegative(),
  humanInstruction: z.string().optional(),
  automation: stepAutomationSchema.optional(),
});

export type Step = Readonly<z.infer<typeof stepSchema>>;

// ── Parse warning ─────────────────────────────────────────────

export const parseWarningSchema = z.object({
  rawText: z.string(),
  reason: z.string().min(1),
  scenario: z.string().optional(),
  index: z.number().int().nonnegative().optional(),
});

export type ParseWarning = z.infer<typeof parseWarningSchema>;

export type ParseResult =
  | { ok: true; step: Step }
  | { ok: false; warning: ParseWarning };
