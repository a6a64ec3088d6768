import { z } from 'zod';

import { DEFAULT_STEP_TIMEOUT_SECONDS } from './step.js';

// ── Browser block ───────────────────────────────────────────

const BROWSER_ALIASES: Readonly<Record<string, string>> = {
  chrome: 'chromium',
  edge: 'chromium',
  safari: 'webkit',
};

export const browserNameSchema = z.preprocess(
  (v) => (typeof v === 'string' ? BROWSER_ALIASES[v.toLowerCase()] ?? v.toLowerCase() : v),
  z.enum(['chromium', 'firefox', 'webkit']),
);

export type BrowserName = z.infer<typeof browserNameSchema>;

export const browserConfigSchema = z.object({
  name: browserNameSchema.default('chromium'),
  headless: z.boolean().default(false),
  window_size: z
    .tuple([z.number().int().positive(), z.number().int().positive()])
    .default([1920, 1080]),
  page_load_timeout: z.number().positive().default(30),
});

export type BrowserConfig = z.infer<typeof browserConfigSchema>;

// ── Test block ──────────────────────────────────────────────

export const testConfigSchema = z.object({
  base_url: z.string().url().optional(),
  screenshot_dir: z.string().min(1).default('test_output/screenshots'),
  report_dir: z.string().min(1).default('test_output/reports'),
  wait_timeout: z.number().int().positive().default(DEFAULT_STEP_TIMEOUT_SECONDS),
  settle_delay_ms: z.number().int().nonnegative().default(1000),
  analyze_structure: z.boolean().default(true),
  screenshot_on_success: z.boolean().default(false),
});

export type TestConfig = z.infer<typeof testConfigSchema>;

// ── Full config file ────────────────────────────────────────
// Unknown top-level sections are tolerated and ignored.

export const fileConfigSchema = z.object({
  browser: browserConfigSchema.default({}),
  test: testConfigSchema.default({}),
});

export type FileConfig = z.infer<typeof fileConfigSchema>;
