import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { ScenarioResult, StepResult } from '../schema/index.js';
import { scenarioStatus } from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type {
  JsonOutput,
  JsonOutputScenario,
  JsonOutputStep,
} from '../schema/jsonOutput.js';

// Re-export contract types for consumers
export type { JsonOutput, JsonOutputScenario, JsonOutputStep };

export const RESULTS_FILE = 'results.json';

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(results: readonly ScenarioResult[], exitCode: number): JsonOutput {
  const scenarios = results.map(scenarioToJSON);
  return {
    version: JSON_OUTPUT_VERSION,
    exitCode,
    passed: scenarios.filter((s) => s.status === 'passed').length,
    failed: scenarios.filter((s) => s.status !== 'passed').length,
    scenarios,
  };
}

function scenarioToJSON(result: ScenarioResult): JsonOutputScenario {
  return {
    name: result.name,
    url: result.url,
    status: scenarioStatus(result),
    aborted: result.aborted,
    durationMs: result.durationMs,
    steps: result.results.map(stepToJSON),
    warnings: result.warnings.map((w) => ({
      rawText: w.rawText,
      reason: w.reason,
      ...(w.index !== undefined ? { index: w.index } : {}),
    })),
    ...(result.abortedAtIndex !== undefined ? { abortedAtIndex: result.abortedAtIndex } : {}),
    ...(result.failure !== undefined
      ? { failure: { errorKind: result.failure.errorKind, diagnostic: result.failure.diagnostic } }
      : {}),
    ...(result.metrics !== undefined ? { metrics: result.metrics } : {}),
  };
}

function stepToJSON(sr: StepResult): JsonOutputStep {
  return {
    index: sr.index,
    action: sr.step.action,
    description: sr.step.rawText,
    target: sr.step.target,
    succeeded: sr.succeeded,
    elapsedMs: sr.elapsedMs,
    ...(sr.step.value !== undefined ? { value: sr.step.value } : {}),
    ...(sr.errorKind !== undefined ? { errorKind: sr.errorKind } : {}),
    ...(sr.diagnostic !== undefined ? { diagnostic: sr.diagnostic } : {}),
    ...(sr.screenshotPath !== undefined ? { screenshotPath: sr.screenshotPath } : {}),
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: unknown): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (!isPlainObject(value)) return value;
  const sorted: Record<string, unknown> = {};
  for (const k of Object.keys(value).sort()) {
    sorted[k] = value[k];
  }
  return sorted;
}

/** Write the JSON document to `<dir>/results.json`; returns the file path. */
export async function writeJSONReport(dir: string, output: JsonOutput): Promise<string> {
  await mkdir(dir, { recursive: true });
  const filePath = path.join(dir, RESULTS_FILE);
  await writeFile(filePath, serializeJSON(output) + '\n', 'utf-8');
  return filePath;
}

// ── Text summary ─────────────────────────────────────────────

const STATUS_LABELS = {
  passed: 'PASS',
  failed: 'FAIL',
  cancelled: 'CANCELLED',
} as const;

function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

/** Human-readable run summary, one block per scenario. */
export function formatSummary(results: readonly ScenarioResult[]): string {
  const lines: string[] = ['', '--- Scenario Results ---'];

  for (const result of results) {
    const status = scenarioStatus(result);
    const passedSteps = result.results.filter((r) => r.succeeded).length;
    lines.push(
      `[${STATUS_LABELS[status]}] ${result.name} (${String(passedSteps)}/${String(result.results.length)} steps, ${formatDuration(result.durationMs)})`,
    );
    if (result.failure !== undefined) {
      const where = result.failure.stepIndex !== undefined
        ? `step ${String(result.failure.stepIndex + 1)}: `
        : '';
      lines.push(`       ${where}${result.failure.errorKind}: ${result.failure.diagnostic}`);
    }
    if (result.warnings.length > 0) {
      lines.push(`       ${String(result.warnings.length)} step(s) skipped at compile time`);
    }
  }

  const passed = results.filter((r) => scenarioStatus(r) === 'passed').length;
  lines.push('');
  lines.push(`Scenarios: ${String(passed)} passed, ${String(results.length - passed)} failed`);
  lines.push('');
  return lines.join('\n');
}
